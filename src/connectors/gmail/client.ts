/**
 * Gmail API client wrapper.
 *
 * Thin layer over `googleapis` exposing the three calls the sync needs:
 * list message ids for a query, get a full message, and remove the UNREAD
 * label from a batch of messages.
 *
 * Every method acquires quota from the rate limiter before calling the API.
 * Retries are not done here; the orchestrator's RetryPolicy wraps each call
 * so that all remote operations in a run share one backoff setting.
 */

import { type gmail_v1, google } from "googleapis";
import type { Logger, RateLimiter } from "../core/index.js";
import type { GoogleAuth } from "../google/auth.js";
import type { MailboxClient } from "./types.js";

// ─── Quota costs (units per call) ───

const COST_LIST_MESSAGES = 5;
const COST_GET_MESSAGE = 5;
const COST_BATCH_MODIFY = 50;

/** messages.batchModify accepts at most this many ids. */
export const MAX_BATCH_MODIFY_IDS = 1000;

// ─── Client ───

export class GmailClient implements MailboxClient {
  private readonly gmail: gmail_v1.Gmail;
  private readonly rateLimiter: RateLimiter;
  private readonly logger: Logger;
  private readonly pageSize: number;

  constructor(
    auth: GoogleAuth,
    rateLimiter: RateLimiter,
    logger: Logger,
    opts: { pageSize?: number } = {},
  ) {
    this.rateLimiter = rateLimiter;
    this.logger = logger;
    this.pageSize = Math.min(opts.pageSize ?? 500, 500);
    this.gmail = google.gmail({ version: "v1", auth });
  }

  // ── Messages ──

  /** All message ids matching `query`, following pagination. */
  async listMessageIds(
    query: string,
    maxResults: number | null,
  ): Promise<string[]> {
    const ids: string[] = [];
    let pageToken: string | undefined;

    do {
      await this.rateLimiter.acquire(COST_LIST_MESSAGES);
      const remaining = maxResults === null ? this.pageSize : maxResults - ids.length;
      const res = await this.gmail.users.messages.list({
        userId: "me",
        q: query,
        maxResults: Math.min(this.pageSize, remaining),
        pageToken,
      });

      for (const m of res.data.messages ?? []) {
        if (m.id) ids.push(m.id);
      }
      pageToken = res.data.nextPageToken ?? undefined;
      this.logger.debug("Listed message page", {
        total: ids.length,
        more: pageToken !== undefined,
      });
    } while (pageToken && (maxResults === null || ids.length < maxResults));

    return maxResults === null ? ids : ids.slice(0, maxResults);
  }

  /** Fetch a single message with `format=full`. */
  async getMessage(messageId: string): Promise<gmail_v1.Schema$Message> {
    await this.rateLimiter.acquire(COST_GET_MESSAGE);
    const res = await this.gmail.users.messages.get({
      userId: "me",
      id: messageId,
      format: "full",
    });
    return res.data;
  }

  // ── Labels ──

  /** Remove UNREAD from up to 1000 messages in one call. */
  async markAsRead(messageIds: string[]): Promise<void> {
    if (messageIds.length === 0) return;
    if (messageIds.length > MAX_BATCH_MODIFY_IDS) {
      throw new Error(
        `batchModify takes at most ${MAX_BATCH_MODIFY_IDS} ids, got ${messageIds.length}`,
      );
    }
    await this.rateLimiter.acquire(COST_BATCH_MODIFY);
    await this.gmail.users.messages.batchModify({
      userId: "me",
      requestBody: { ids: messageIds, removeLabelIds: ["UNREAD"] },
    });
  }
}
