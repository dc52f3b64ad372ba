/**
 * MysqlCommentStore: comment operations against a WordPress database.
 *
 * Status semantics follow the CMS: `comment_approved` holds "1" (approved),
 * "0" (awaiting moderation), "spam", "trash" or "post-trashed". Trash and spam
 * remember the previous status in comment meta so untrash/unspam can restore it.
 */
import type { CommentStore } from "../interface.ts";
import type {
  CommentCount,
  CommentFields,
  CommentQuery,
  CommentRecord,
  CommentStatus,
  ModerationStatus,
  PostRef,
  StatusChange,
} from "../types.ts";
import type { Row, SqlExecutor } from "./pool.ts";
import { debug } from "../../lib/log.ts";

const TRASH_STATUS_META = "_wp_trash_meta_status";
const TRASH_TIME_META = "_wp_trash_meta_time";

const MODERATION_VALUES: Record<ModerationStatus, string> = {
  approve: "1",
  hold: "0",
};

type ColumnDef = {
  name: keyof CommentRecord;
  numeric: boolean;
};

const COMMENT_COLUMNS: ColumnDef[] = [
  { name: "comment_ID", numeric: true },
  { name: "comment_post_ID", numeric: true },
  { name: "comment_author", numeric: false },
  { name: "comment_author_email", numeric: false },
  { name: "comment_author_url", numeric: false },
  { name: "comment_author_IP", numeric: false },
  { name: "comment_date", numeric: false },
  { name: "comment_date_gmt", numeric: false },
  { name: "comment_content", numeric: false },
  { name: "comment_karma", numeric: true },
  { name: "comment_approved", numeric: false },
  { name: "comment_agent", numeric: false },
  { name: "comment_type", numeric: false },
  { name: "comment_parent", numeric: true },
  { name: "user_id", numeric: true },
];

/** Columns an insert may set; comment_ID is assigned by the database. */
const INSERTABLE_COLUMNS = COMMENT_COLUMNS.filter((c) => c.name !== "comment_ID");

export function toCommentRecord(row: Row): CommentRecord {
  const text = (key: string) => (row[key] === null || row[key] === undefined ? "" : String(row[key]));
  const num = (key: string) => Number(row[key] ?? 0);
  return {
    comment_ID: num("comment_ID"),
    comment_post_ID: num("comment_post_ID"),
    comment_author: text("comment_author"),
    comment_author_email: text("comment_author_email"),
    comment_author_url: text("comment_author_url"),
    comment_author_IP: text("comment_author_IP"),
    comment_date: text("comment_date"),
    comment_date_gmt: text("comment_date_gmt"),
    comment_content: text("comment_content"),
    comment_karma: num("comment_karma"),
    comment_approved: text("comment_approved"),
    comment_agent: text("comment_agent"),
    comment_type: text("comment_type"),
    comment_parent: num("comment_parent"),
    user_id: num("user_id"),
  };
}

export function toCommentStatus(raw: string): CommentStatus | false {
  switch (raw) {
    case "1":
      return "approved";
    case "0":
      return "unapproved";
    case "spam":
      return "spam";
    case "trash":
      return "trash";
    default:
      return false;
  }
}

/** `YYYY-MM-DD HH:MM:SS`, in local time or UTC. */
export function formatDateTime(date: Date, utc: boolean): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  const parts = utc
    ? [date.getUTCFullYear(), date.getUTCMonth() + 1, date.getUTCDate(), date.getUTCHours(), date.getUTCMinutes(), date.getUTCSeconds()]
    : [date.getFullYear(), date.getMonth() + 1, date.getDate(), date.getHours(), date.getMinutes(), date.getSeconds()];
  const [y, mo, d, h, mi, s] = parts.map(pad);
  return `${y}-${mo}-${d} ${h}:${mi}:${s}`;
}

/** Convert a local `YYYY-MM-DD HH:MM:SS` value to UTC; other shapes pass through unchanged. */
export function localToGmt(value: string): string {
  const match = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/.exec(value);
  if (!match) return value;
  const [y, mo, d, h, mi, s] = match.slice(1).map(Number);
  const date = new Date(y ?? 0, (mo ?? 1) - 1, d, h, mi, s);
  return Number.isNaN(date.getTime()) ? value : formatDateTime(date, true);
}

export class MysqlCommentStore implements CommentStore {
  private sql: SqlExecutor;
  private comments: string;
  private commentmeta: string;
  private posts: string;
  private now: () => Date;

  constructor(sql: SqlExecutor, params: { tablePrefix: string; now?: () => Date }) {
    this.sql = sql;
    this.comments = `${params.tablePrefix}comments`;
    this.commentmeta = `${params.tablePrefix}commentmeta`;
    this.posts = `${params.tablePrefix}posts`;
    this.now = params.now ?? (() => new Date());
  }

  // --- Posts ---

  async getPost(id: number): Promise<PostRef | null> {
    if (id <= 0) return null;
    const rows = await this.sql.rows(
      `SELECT ID, post_title, post_status FROM ${this.posts} WHERE ID = ? LIMIT 1`,
      [id],
    );
    const row = rows[0];
    if (!row) return null;
    return {
      ID: Number(row["ID"]),
      post_title: String(row["post_title"] ?? ""),
      post_status: String(row["post_status"] ?? ""),
    };
  }

  // --- Mutations ---

  async insertComment(fields: CommentFields): Promise<number | null> {
    const now = this.now();
    const defaults: Record<string, string> = {
      comment_post_ID: "0",
      comment_author: "",
      comment_author_email: "",
      comment_author_url: "",
      comment_author_IP: "",
      comment_date: fields["comment_date"] ?? formatDateTime(now, false),
      comment_date_gmt:
        fields["comment_date"] !== undefined
          ? localToGmt(fields["comment_date"])
          : formatDateTime(now, true),
      comment_content: "",
      comment_karma: "0",
      comment_approved: "1",
      comment_agent: "",
      comment_type: "comment",
      comment_parent: "0",
      user_id: "0",
    };

    for (const key of Object.keys(fields)) {
      if (!INSERTABLE_COLUMNS.some((c) => c.name === key)) {
        debug(`ignoring unknown comment field '${key}'`);
      }
    }

    const names = INSERTABLE_COLUMNS.map((c) => c.name);
    const values = INSERTABLE_COLUMNS.map((c) => {
      const value = fields[c.name] ?? defaults[c.name] ?? "";
      return c.numeric ? Number.parseInt(value, 10) || 0 : value;
    });

    const result = await this.sql.run(
      `INSERT INTO ${this.comments} (${names.join(", ")}) VALUES (${names.map(() => "?").join(", ")})`,
      values,
    );
    if (!result.insertId) return null;

    const approved = fields["comment_approved"] ?? defaults["comment_approved"];
    if (approved === "1") {
      await this.updateCommentCount(Number.parseInt(fields["comment_post_ID"] ?? "0", 10) || 0);
    }
    return result.insertId;
  }

  async deleteComment(id: number, force: boolean): Promise<boolean> {
    const comment = await this.getComment(id);
    if (!comment) return false;

    if (!force && comment.comment_approved !== "trash" && comment.comment_approved !== "spam") {
      return this.trashComment(id);
    }

    // Children move up to the deleted comment's parent
    await this.sql.run(
      `UPDATE ${this.comments} SET comment_parent = ? WHERE comment_parent = ?`,
      [comment.comment_parent, id],
    );
    await this.sql.run(`DELETE FROM ${this.commentmeta} WHERE comment_id = ?`, [id]);
    const result = await this.sql.run(`DELETE FROM ${this.comments} WHERE comment_ID = ?`, [id]);
    if (result.affectedRows === 0) return false;

    if (comment.comment_approved === "1") {
      await this.updateCommentCount(comment.comment_post_ID);
    }
    return true;
  }

  trashComment(id: number): Promise<boolean> {
    return this.park(id, "trash");
  }

  untrashComment(id: number): Promise<boolean> {
    return this.restore(id);
  }

  spamComment(id: number): Promise<boolean> {
    return this.park(id, "spam");
  }

  unspamComment(id: number): Promise<boolean> {
    return this.restore(id);
  }

  async setCommentStatus(
    id: number,
    status: ModerationStatus,
    strict: boolean,
  ): Promise<StatusChange> {
    const comment = await this.getComment(id);
    if (!comment) {
      return { ok: false, code: "invalid_comment", message: "Invalid comment ID." };
    }

    const result = await this.sql.run(
      `UPDATE ${this.comments} SET comment_approved = ? WHERE comment_ID = ?`,
      [MODERATION_VALUES[status], id],
    );
    if (strict && result.changedRows === 0) {
      return { ok: false, code: "db_update_error", message: "Could not update comment status." };
    }

    await this.updateCommentCount(comment.comment_post_ID);
    return { ok: true };
  }

  // --- Queries ---

  async getComment(id: number): Promise<CommentRecord | null> {
    if (id <= 0) return null;
    const rows = await this.sql.rows(
      `SELECT * FROM ${this.comments} WHERE comment_ID = ? LIMIT 1`,
      [id],
    );
    const row = rows[0];
    return row ? toCommentRecord(row) : null;
  }

  async getCommentStatus(id: number): Promise<CommentStatus | false> {
    const comment = await this.getComment(id);
    if (!comment) return false;
    return toCommentStatus(comment.comment_approved);
  }

  async countComments(postId: number): Promise<CommentCount> {
    const rows =
      postId > 0
        ? await this.sql.rows(
            `SELECT comment_approved, COUNT(*) AS total FROM ${this.comments} WHERE comment_post_ID = ? GROUP BY comment_approved`,
            [postId],
          )
        : await this.sql.rows(
            `SELECT comment_approved, COUNT(*) AS total FROM ${this.comments} GROUP BY comment_approved`,
          );

    const totals = { approved: 0, moderated: 0, spam: 0, trash: 0, postTrashed: 0 };
    for (const row of rows) {
      const total = Number(row["total"] ?? 0);
      switch (String(row["comment_approved"])) {
        case "1":
          totals.approved += total;
          break;
        case "0":
          totals.moderated += total;
          break;
        case "spam":
          totals.spam += total;
          break;
        case "trash":
          totals.trash += total;
          break;
        case "post-trashed":
          totals.postTrashed += total;
          break;
      }
    }

    return {
      approved: totals.approved,
      spam: totals.spam,
      trash: totals.trash,
      "post-trashed": totals.postTrashed,
      total_comments: totals.approved + totals.moderated + totals.spam,
      all: totals.approved + totals.moderated,
      moderated: totals.moderated,
    };
  }

  async queryComments(query: CommentQuery): Promise<CommentRecord[]> {
    const rows = await this.sql.rows(
      `SELECT * FROM ${this.comments} WHERE comment_approved = ? ORDER BY comment_date_gmt DESC, comment_ID DESC LIMIT ?`,
      [MODERATION_VALUES[query.status], query.number],
    );
    return rows.map(toCommentRecord);
  }

  // --- Internals ---

  /** Move a comment to trash or spam, remembering where it came from. */
  private async park(id: number, status: "trash" | "spam"): Promise<boolean> {
    const comment = await this.getComment(id);
    if (!comment) return false;

    if (!(await this.setRawStatus(id, status))) return false;
    await this.sql.run(
      `INSERT INTO ${this.commentmeta} (comment_id, meta_key, meta_value) VALUES (?, ?, ?), (?, ?, ?)`,
      [
        id, TRASH_STATUS_META, comment.comment_approved,
        id, TRASH_TIME_META, String(Math.floor(this.now().getTime() / 1000)),
      ],
    );
    await this.updateCommentCount(comment.comment_post_ID);
    return true;
  }

  /** Undo trash or spam, falling back to awaiting moderation. */
  private async restore(id: number): Promise<boolean> {
    const comment = await this.getComment(id);
    if (!comment) return false;

    // The earliest recorded status is the one the comment had before it was parked
    const rows = await this.sql.rows(
      `SELECT meta_value FROM ${this.commentmeta} WHERE comment_id = ? AND meta_key = ? ORDER BY meta_id ASC LIMIT 1`,
      [id, TRASH_STATUS_META],
    );
    const previous = rows[0] ? String(rows[0]["meta_value"] ?? "") : "";

    if (!(await this.setRawStatus(id, previous || "0"))) return false;
    await this.sql.run(
      `DELETE FROM ${this.commentmeta} WHERE comment_id = ? AND meta_key IN (?, ?)`,
      [id, TRASH_STATUS_META, TRASH_TIME_META],
    );
    await this.updateCommentCount(comment.comment_post_ID);
    return true;
  }

  /** False when the row already held that status. */
  private async setRawStatus(id: number, raw: string): Promise<boolean> {
    const result = await this.sql.run(
      `UPDATE ${this.comments} SET comment_approved = ? WHERE comment_ID = ?`,
      [raw, id],
    );
    return result.changedRows > 0;
  }

  private async updateCommentCount(postId: number): Promise<void> {
    if (postId <= 0) return;
    await this.sql.run(
      `UPDATE ${this.posts} SET comment_count = (SELECT COUNT(*) FROM ${this.comments} WHERE comment_post_ID = ? AND comment_approved = '1') WHERE ID = ?`,
      [postId, postId],
    );
  }
}
