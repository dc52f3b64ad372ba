import type { CommentStore } from "../../src/store/interface.ts";
import type {
  CommentCount,
  CommentFields,
  CommentQuery,
  CommentRecord,
  CommentStatus,
  ModerationStatus,
  PostRef,
  StatusChange,
} from "../../src/store/types.ts";
import { toCommentStatus } from "../../src/store/mysql/store.ts";

export type StoreCall = { method: string; args: unknown[] };

export function makeComment(overrides: Partial<CommentRecord> & { comment_ID: number }): CommentRecord {
  const { comment_ID, ...rest } = overrides;
  return {
    comment_ID,
    comment_post_ID: 1,
    comment_author: "",
    comment_author_email: "",
    comment_author_url: "",
    comment_author_IP: "",
    comment_date: "2024-01-01 00:00:00",
    comment_date_gmt: "2024-01-01 00:00:00",
    comment_content: "",
    comment_karma: 0,
    comment_approved: "1",
    comment_agent: "",
    comment_type: "comment",
    comment_parent: 0,
    user_id: 0,
    ...rest,
  };
}

/** In-memory CommentStore with the same status rules as the database store. */
export class MemoryCommentStore implements CommentStore {
  posts = new Map<number, PostRef>();
  comments = new Map<number, CommentRecord>();
  previousStatus = new Map<number, string>();
  calls: StoreCall[] = [];
  failInserts = false;
  private nextId = 1;

  addPost(id: number, title = `Post ${id}`): this {
    this.posts.set(id, { ID: id, post_title: title, post_status: "publish" });
    return this;
  }

  addComment(overrides: Partial<CommentRecord> & { comment_ID: number }): this {
    this.comments.set(overrides.comment_ID, makeComment(overrides));
    this.nextId = Math.max(this.nextId, overrides.comment_ID + 1);
    return this;
  }

  private record(method: string, ...args: unknown[]): void {
    this.calls.push({ method, args });
  }

  called(method: string): boolean {
    return this.calls.some((c) => c.method === method);
  }

  async getPost(id: number): Promise<PostRef | null> {
    this.record("getPost", id);
    return this.posts.get(id) ?? null;
  }

  async insertComment(fields: CommentFields): Promise<number | null> {
    this.record("insertComment", fields);
    if (this.failInserts) return null;
    const id = this.nextId++;
    this.comments.set(
      id,
      makeComment({
        comment_ID: id,
        comment_post_ID: Number(fields["comment_post_ID"] ?? 0),
        comment_author: fields["comment_author"] ?? "",
        comment_content: fields["comment_content"] ?? "",
        comment_approved: fields["comment_approved"] ?? "1",
      }),
    );
    return id;
  }

  async deleteComment(id: number, force: boolean): Promise<boolean> {
    this.record("deleteComment", id, force);
    const comment = this.comments.get(id);
    if (!comment) return false;
    if (!force && comment.comment_approved !== "trash" && comment.comment_approved !== "spam") {
      return this.park(id, "trash");
    }
    this.comments.delete(id);
    this.previousStatus.delete(id);
    return true;
  }

  async trashComment(id: number): Promise<boolean> {
    this.record("trashComment", id);
    return this.park(id, "trash");
  }

  async untrashComment(id: number): Promise<boolean> {
    this.record("untrashComment", id);
    return this.restore(id);
  }

  async spamComment(id: number): Promise<boolean> {
    this.record("spamComment", id);
    return this.park(id, "spam");
  }

  async unspamComment(id: number): Promise<boolean> {
    this.record("unspamComment", id);
    return this.restore(id);
  }

  async setCommentStatus(
    id: number,
    status: ModerationStatus,
    strict: boolean,
  ): Promise<StatusChange> {
    this.record("setCommentStatus", id, status, strict);
    const comment = this.comments.get(id);
    if (!comment) {
      return { ok: false, code: "invalid_comment", message: "Invalid comment ID." };
    }
    const raw = status === "approve" ? "1" : "0";
    if (strict && comment.comment_approved === raw) {
      return { ok: false, code: "db_update_error", message: "Could not update comment status." };
    }
    comment.comment_approved = raw;
    return { ok: true };
  }

  async getComment(id: number): Promise<CommentRecord | null> {
    this.record("getComment", id);
    return this.comments.get(id) ?? null;
  }

  async getCommentStatus(id: number): Promise<CommentStatus | false> {
    this.record("getCommentStatus", id);
    const comment = this.comments.get(id);
    return comment ? toCommentStatus(comment.comment_approved) : false;
  }

  async countComments(postId: number): Promise<CommentCount> {
    this.record("countComments", postId);
    const scoped = [...this.comments.values()].filter(
      (c) => postId === 0 || c.comment_post_ID === postId,
    );
    const n = (raw: string) => scoped.filter((c) => c.comment_approved === raw).length;
    const approved = n("1");
    const moderated = n("0");
    const spam = n("spam");
    return {
      approved,
      spam,
      trash: n("trash"),
      "post-trashed": n("post-trashed"),
      total_comments: approved + moderated + spam,
      all: approved + moderated,
      moderated,
    };
  }

  async queryComments(query: CommentQuery): Promise<CommentRecord[]> {
    this.record("queryComments", query);
    const raw = query.status === "approve" ? "1" : "0";
    return [...this.comments.values()]
      .filter((c) => c.comment_approved === raw)
      .sort(
        (a, b) =>
          b.comment_date_gmt.localeCompare(a.comment_date_gmt) || b.comment_ID - a.comment_ID,
      )
      .slice(0, query.number);
  }

  private park(id: number, status: "trash" | "spam"): boolean {
    const comment = this.comments.get(id);
    if (!comment || comment.comment_approved === status) return false;
    this.previousStatus.set(id, comment.comment_approved);
    comment.comment_approved = status;
    return true;
  }

  private restore(id: number): boolean {
    const comment = this.comments.get(id);
    if (!comment) return false;
    const previous = this.previousStatus.get(id) ?? "0";
    if (comment.comment_approved === previous) return false;
    comment.comment_approved = previous;
    this.previousStatus.delete(id);
    return true;
  }
}
