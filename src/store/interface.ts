/**
 * CommentStore interface: every store operation the comment commands need.
 * The mysql2 store implements it against a WordPress database; tests use an
 * in-memory implementation.
 */
import type {
  CommentCount,
  CommentFields,
  CommentQuery,
  CommentRecord,
  CommentStatus,
  ModerationStatus,
  PostRef,
  StatusChange,
} from "./types.ts";

export interface CommentStore {
  // --- Posts ---
  getPost(id: number): Promise<PostRef | null>;

  // --- Mutations ---

  /** Low-level insert: no notifications, no duplicate or flood checks. */
  insertComment(fields: CommentFields): Promise<number | null>;

  /** Without `force`, comments outside trash/spam are moved to trash instead. */
  deleteComment(id: number, force: boolean): Promise<boolean>;

  trashComment(id: number): Promise<boolean>;
  untrashComment(id: number): Promise<boolean>;
  spamComment(id: number): Promise<boolean>;
  unspamComment(id: number): Promise<boolean>;

  /**
   * With `strict`, an update that changes nothing is reported as an error
   * instead of succeeding silently.
   */
  setCommentStatus(
    id: number,
    status: ModerationStatus,
    strict: boolean,
  ): Promise<StatusChange>;

  // --- Queries ---
  getComment(id: number): Promise<CommentRecord | null>;

  /** `false` when the comment does not exist or has an unknown status. */
  getCommentStatus(id: number): Promise<CommentStatus | false>;

  /** Post id 0 counts the whole site. */
  countComments(postId: number): Promise<CommentCount>;

  /** Newest first by GMT date. */
  queryComments(query: CommentQuery): Promise<CommentRecord[]>;
}
