/** Sent in place of a model reply whenever the completion cannot be used. */
export const FALLBACK_REPLY = "(pseudo) i'm on fallback juice — here's a quick take.";
