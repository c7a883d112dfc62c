/**
 * Gmail source: implements `SourceAdapter` and `AcknowledgmentAdapter`
 * for the orchestrator.
 *
 *   list         unread Inbox messages, subject filters pushed into the
 *                Gmail search query
 *   fetch        full message payload; a 404 becomes `NotFoundError`
 *   acknowledge  remove UNREAD, in chunks batchModify accepts
 */

import type { gmail_v1 } from "googleapis";
import type {
  AcknowledgmentAdapter,
  ItemIdentity,
  SourceAdapter,
  SubjectFilter,
} from "../core/index.js";
import { httpStatusOf, NotFoundError } from "../core/index.js";
import { MAX_BATCH_MODIFY_IDS } from "./client.js";
import type { GmailConfig, MailboxClient } from "./types.js";

export const DEFAULT_GMAIL_CONFIG: GmailConfig = {
  baseQuery: "in:inbox is:unread",
  maxResults: null,
};

// ─── Query building ───

function quoteKeyword(keyword: string): string {
  const cleaned = keyword.replace(/"/g, "").trim();
  return /\s/.test(cleaned) ? `"${cleaned}"` : cleaned;
}

function subjectClause(keywords: string[]): string {
  const terms = keywords.map(quoteKeyword).filter((k) => k !== "");
  return `subject:(${terms.join(" OR ")})`;
}

/**
 * Gmail search query for `filter`, e.g.
 * `in:inbox is:unread subject:(invoice OR receipt) -subject:(spam)`.
 */
export function buildQuery(baseQuery: string, filter: SubjectFilter): string {
  const parts = [baseQuery];
  if (filter.include.length > 0) parts.push(subjectClause(filter.include));
  if (filter.exclude.length > 0) parts.push(`-${subjectClause(filter.exclude)}`);
  return parts.join(" ");
}

// ─── Adapter ───

export class GmailSource
  implements SourceAdapter<gmail_v1.Schema$Message>, AcknowledgmentAdapter
{
  readonly name = "gmail";
  private readonly client: MailboxClient;
  private readonly config: GmailConfig;

  constructor(client: MailboxClient, config: Partial<GmailConfig> = {}) {
    this.client = client;
    this.config = { ...DEFAULT_GMAIL_CONFIG, ...config };
  }

  list(filter: SubjectFilter): Promise<ItemIdentity[]> {
    return this.client.listMessageIds(
      buildQuery(this.config.baseQuery, filter),
      this.config.maxResults,
    );
  }

  async fetch(id: ItemIdentity): Promise<gmail_v1.Schema$Message> {
    try {
      return await this.client.getMessage(id);
    } catch (err) {
      if (httpStatusOf(err) === 404) {
        throw new NotFoundError(id, { cause: err });
      }
      throw err;
    }
  }

  async acknowledge(ids: ItemIdentity[]): Promise<void> {
    for (let i = 0; i < ids.length; i += MAX_BATCH_MODIFY_IDS) {
      await this.client.markAsRead(ids.slice(i, i + MAX_BATCH_MODIFY_IDS));
    }
  }
}
