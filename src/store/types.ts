// --- Comment statuses ---

/** Status names as reported by a status lookup. */
export type CommentStatus = "approved" | "unapproved" | "spam" | "trash";

/** Targets accepted by a moderation status change. */
export type ModerationStatus = "approve" | "hold";

export type TransitionVerb = "trash" | "untrash" | "spam" | "unspam";

// --- Records ---

/** Column values for a new comment, keyed by column name. */
export type CommentFields = Record<string, string>;

export type CommentRecord = {
  comment_ID: number;
  comment_post_ID: number;
  comment_author: string;
  comment_author_email: string;
  comment_author_url: string;
  comment_author_IP: string;
  comment_date: string;
  comment_date_gmt: string;
  comment_content: string;
  comment_karma: number;
  comment_approved: string;
  comment_agent: string;
  comment_type: string;
  comment_parent: number;
  user_id: number;
};

export type PostRef = {
  ID: number;
  post_title: string;
  post_status: string;
};

/**
 * Comment totals for a post or the whole site.
 * Key order is the order the store reports them in.
 */
export type CommentCount = {
  approved: number;
  spam: number;
  trash: number;
  "post-trashed": number;
  total_comments: number;
  all: number;
  moderated: number;
};

export type StatusChange =
  | { ok: true }
  | { ok: false; code: string; message: string };

export type CommentQuery = {
  status: ModerationStatus;
  number: number;
};
