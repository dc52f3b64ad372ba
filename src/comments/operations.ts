/**
 * Comment operations: one function per `comment` subcommand.
 *
 * Each operation makes at most one mutating store call and returns a
 * CommandResult. Ids are taken as the raw CLI argument so messages quote
 * exactly what was typed.
 */
import type { CommentStore } from "../store/interface.ts";
import type { CommentFields, CommentRecord, ModerationStatus, TransitionVerb } from "../store/types.ts";
import { toId } from "../lib/ids.ts";
import { padLabel } from "../lib/output.ts";
import { TRANSITIONS } from "./transitions.ts";
import { done, fail, heading, line, success, type CommandResult } from "./result.ts";

const COUNT_LABEL_WIDTH = 17;
const FIELD_LABEL_WIDTH = 23;

const POST_ID_FIELD = "comment_post_ID";

const SUMMARY_FIELDS: (keyof CommentRecord)[] = [
  "comment_ID",
  "comment_author",
  "comment_author_email",
  "comment_author_url",
  "comment_content",
];

// --- create ---

export async function createComment(
  store: CommentStore,
  fields: CommentFields,
  opts: { porcelain?: boolean } = {},
): Promise<CommandResult> {
  const rawPostId = fields[POST_ID_FIELD];
  if (rawPostId === undefined) {
    return fail(`Cannot find post: --${POST_ID_FIELD} is required.`);
  }

  const post = await store.getPost(toId(rawPostId));
  if (!post) {
    return fail(`Cannot find post ${rawPostId}.`);
  }

  const commentId = await store.insertComment(fields);
  if (!commentId) {
    return fail("Could not create comment.");
  }

  return opts.porcelain
    ? done(line(String(commentId)))
    : done(success(`Inserted comment ${commentId}.`));
}

// --- delete ---

export async function deleteComment(
  store: CommentStore,
  rawId: string,
  opts: { force?: boolean } = {},
): Promise<CommandResult> {
  const deleted = await store.deleteComment(toId(rawId), opts.force === true);
  return deleted
    ? done(success(`Deleted comment ${rawId}.`))
    : fail(`Failed deleting comment ${rawId}`);
}

// --- trash / untrash / spam / unspam ---

export async function transitionComment(
  store: CommentStore,
  verb: TransitionVerb,
  rawId: string,
): Promise<CommandResult> {
  const transition = TRANSITIONS[verb];
  const changed = await transition.apply(store, toId(rawId));
  return changed
    ? done(success(`${transition.success} comment ${rawId}.`))
    : fail(`${transition.failure} comment ${rawId}`);
}

// --- approve / unapprove ---

const MODERATION = {
  approve: { status: "approve", success: "Approved" },
  unapprove: { status: "hold", success: "Unapproved" },
} satisfies Record<string, { status: ModerationStatus; success: string }>;

export type ModerationVerb = keyof typeof MODERATION;

/**
 * Only approve/unapprove look the comment up first, so only they report
 * "does not exist"; the transition group relies on the store's false result.
 */
export async function commentExists(
  store: CommentStore,
  rawId: string,
): Promise<CommandResult | true> {
  const comment = await store.getComment(toId(rawId));
  if (!comment) {
    return fail(`Comment with ID ${rawId} does not exist.`);
  }
  return true;
}

export async function moderateComment(
  store: CommentStore,
  verb: ModerationVerb,
  rawId: string,
): Promise<CommandResult> {
  const exists = await commentExists(store, rawId);
  if (exists !== true) return exists;

  const { status, success: label } = MODERATION[verb];
  const change = await store.setCommentStatus(toId(rawId), status, true);
  if (!change.ok) {
    return fail(change.message);
  }
  return done(success(`${label} comment ${rawId}`));
}

// --- count ---

export async function countComments(
  store: CommentStore,
  rawPostId?: string,
): Promise<CommandResult> {
  const count = await store.countComments(toId(rawPostId));

  const { total_comments, ...statuses } = count;
  const entries: [string, number][] = [
    ...Object.entries(statuses),
    ["total_comments", total_comments],
  ];

  return done(
    ...entries.map(([status, n]) => line(`${padLabel(status, COUNT_LABEL_WIDTH)}${n}`)),
  );
}

// --- status ---

export async function commentStatus(
  store: CommentStore,
  rawId: string,
): Promise<CommandResult> {
  const status = await store.getCommentStatus(toId(rawId));
  if (status === false) {
    return fail(`Could not check status of comment ${rawId}.`);
  }
  return done(line(status));
}

// --- last ---

export async function lastComment(
  store: CommentStore,
  opts: { id?: boolean; full?: boolean } = {},
): Promise<CommandResult> {
  const [comment] = await store.queryComments({ status: "approve", number: 1 });
  if (!comment) {
    return fail("No approved comments found.");
  }

  if (opts.id) {
    // Exits 1 even though the lookup succeeded
    return { ok: true, lines: [line(String(comment.comment_ID))], exitCode: 1 };
  }

  const entries: [string, string | number][] = opts.full
    ? Object.entries(comment)
    : SUMMARY_FIELDS.map((key): [string, string | number] => [key, comment[key]]);
  return done(
    heading("Last approved comment:"),
    ...entries.map(([key, value]) => line(`${padLabel(key, FIELD_LABEL_WIDTH)}${value}`)),
  );
}
