import type { Command } from "commander";

const USAGE_TEXT = `wp-comment comment — Manage comments in a WordPress database

SUBCOMMANDS:
  comment create --<field>=<value>... [--porcelain]   Insert a comment
  comment delete <id> [--force]                       Delete a comment (trash unless --force)
  comment trash <id>                                  Move a comment to the trash
  comment untrash <id>                                Restore a trashed comment
  comment spam <id>                                   Mark a comment as spam
  comment unspam <id>                                 Restore a spammed comment
  comment approve <id>                                Approve a comment
  comment unapprove <id>                              Hold a comment for moderation
  comment count [<post-id>]                           Count comments by status
  comment status <id>                                 Print a comment's status
  comment last [--id] [--full]                        Show the last approved comment

CREATE FIELDS:
  Any comment column may be set: comment_post_ID (required), comment_author,
  comment_author_email, comment_author_url, comment_author_IP, comment_date,
  comment_date_gmt, comment_content, comment_karma, comment_approved,
  comment_agent, comment_type, comment_parent, user_id.
  Other fields are ignored. The insert sends no notifications.

  Example:
    comment create --comment_post_ID=15 --comment_content="hello blog" --comment_author=cli

STATUSES:
  status prints one of: approved, unapproved, spam, trash.
  trash/spam remember the previous status; untrash/unspam restore it.
  approve/unapprove fail with "does not exist" for unknown ids.

EXIT CODES:
  0 on success, 1 on any error.
  last --id prints the id and exits 1.
`;

export function registerUsage(comment: Command): void {
  comment
    .command("usage")
    .description("Print detailed comment documentation")
    .action(() => {
      console.log(USAGE_TEXT.trim());
    });
}
