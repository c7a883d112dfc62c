/**
 * Gmail adapter type definitions.
 *
 * These are the domain types used internally by the adapter, not the raw
 * googleapis response schemas (those come from `gmail_v1.Schema$*`).
 */

import type { gmail_v1 } from "googleapis";

// ─── Parsed message ───

export interface GmailMessage {
  id: string;
  threadId: string;
  labelIds: string[];
  /** Unix-ms timestamp (Gmail's internalDate). */
  internalDate: number;

  from: string;
  to: string;
  subject: string;
  /** RFC 2822 Date header value. */
  date: string;

  bodyPlain?: string;
  bodyHtml?: string;
  /** Gmail's snippet (~first 100 chars). */
  snippet: string;
}

// ─── MIME walk result ───

export interface MimeWalkResult {
  plain: string;
  html: string;
}

// ─── Adapter configuration ───

export interface GmailConfig {
  /** Base search query; subject filters are appended to it. */
  baseQuery: string;
  /** Stop listing after this many ids; null lists every page. */
  maxResults: number | null;
}

// ─── Mailbox client seam ───

/**
 * The calls the adapter makes against the mailbox. `GmailClient`
 * implements it over googleapis; tests supply an in-memory mailbox.
 */
export interface MailboxClient {
  listMessageIds(query: string, maxResults: number | null): Promise<string[]>;
  getMessage(messageId: string): Promise<gmail_v1.Schema$Message>;
  markAsRead(messageIds: string[]): Promise<void>;
}
