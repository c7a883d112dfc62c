// Source adapter
export { buildQuery, DEFAULT_GMAIL_CONFIG, GmailSource } from "./adapter.js";
// Client
export { GmailClient, MAX_BATCH_MODIFY_IDS } from "./client.js";
// MIME utilities
export { bodyText, getHeader, parseMessage, walkParts } from "./mime.js";
// Transformer
export { formatReceivedAt, gmailTransformer, messageToRow } from "./transform.js";
// Types
export type {
  GmailConfig,
  GmailMessage,
  MailboxClient,
  MimeWalkResult,
} from "./types.js";
