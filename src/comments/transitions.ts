import type { CommentStore } from "../store/interface.ts";
import type { TransitionVerb } from "../store/types.ts";

export type Transition = {
  apply: (store: CommentStore, id: number) => Promise<boolean>;
  /** Prefix for "<success> comment <id>." */
  success: string;
  /** Prefix for "<failure> comment <id>" */
  failure: string;
};

export const TRANSITIONS = {
  trash: {
    apply: (store, id) => store.trashComment(id),
    success: "Trashed",
    failure: "Failed trashing",
  },
  untrash: {
    apply: (store, id) => store.untrashComment(id),
    success: "Untrashed",
    failure: "Failed untrashing",
  },
  spam: {
    apply: (store, id) => store.spamComment(id),
    success: "Marked as spam",
    failure: "Failed marking as spam",
  },
  unspam: {
    apply: (store, id) => store.unspamComment(id),
    success: "Unspammed",
    failure: "Failed unspamming",
  },
} satisfies Record<TransitionVerb, Transition>;

export const TRANSITION_VERBS: TransitionVerb[] = ["trash", "untrash", "spam", "unspam"];
