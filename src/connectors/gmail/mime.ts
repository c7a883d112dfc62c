/**
 * MIME parsing utilities for Gmail message payloads.
 *
 * Gmail returns message bodies in the `payload` tree (nested `MessagePart`
 * objects). This module walks that tree to pull out the text/plain and
 * text/html bodies; attachments are ignored, only the readable body ends up
 * in the sheet.
 *
 * Body data is base64url-encoded by the Gmail API. We decode it here and
 * handle charset conversion for non-UTF-8 content.
 */

import type { gmail_v1 } from "googleapis";
import TurndownService from "turndown";
import { MalformedContentError } from "../core/index.js";
import type { GmailMessage, MimeWalkResult } from "./types.js";

// ─── Turndown singleton ───

const turndown = new TurndownService({
  headingStyle: "atx",
  bulletListMarker: "-",
});
turndown.remove(["script", "style", "head"]);

// ─── Charset helpers ───

/**
 * Extract the `charset` parameter from a Content-Type MIME type string.
 * Returns the charset name normalised to lowercase, or "utf-8" as default.
 */
function extractCharset(mimeType: string | undefined | null): string {
  if (!mimeType) return "utf-8";
  const match = /charset\s*=\s*"?([^";\s]+)"?/i.exec(mimeType);
  return match?.[1] ? match[1].toLowerCase() : "utf-8";
}

const CHARSET_ALIASES: Record<string, string> = {
  ascii: "utf-8",
  "us-ascii": "utf-8",
  cp1252: "windows-1252",
  "iso-8859-1": "windows-1252",
  latin1: "windows-1252",
  gb2312: "gbk",
  gb_2312: "gbk",
};

function decodeBody(data: string, contentType?: string | null): string {
  const raw = Buffer.from(data, "base64url");
  const charset = extractCharset(contentType);
  const label = CHARSET_ALIASES[charset] ?? charset;

  if (label === "utf-8") {
    return raw.toString("utf-8");
  }

  try {
    return new TextDecoder(label).decode(raw);
  } catch {
    // unknown charset label
    return raw.toString("utf-8");
  }
}

function contentTypeOf(part: gmail_v1.Schema$MessagePart): string | null {
  const header = part.headers?.find(
    (h) => h.name?.toLowerCase() === "content-type",
  )?.value;
  return header ?? part.mimeType ?? null;
}

// ─── Part walking ───

/**
 * Recursively walk a payload tree and collect text bodies. The first
 * text/plain and first text/html leaf win; parts carrying a filename are
 * attachments and skipped.
 */
export function walkParts(
  part: gmail_v1.Schema$MessagePart | undefined | null,
): MimeWalkResult {
  const result: MimeWalkResult = { plain: "", html: "" };
  if (!part) return result;

  const mime = (part.mimeType ?? "").toLowerCase();
  const data = part.body?.data;

  if (data && !part.filename) {
    if (mime.startsWith("text/plain")) {
      result.plain = decodeBody(data, contentTypeOf(part));
    } else if (mime.startsWith("text/html")) {
      result.html = decodeBody(data, contentTypeOf(part));
    }
  }

  for (const sub of part.parts ?? []) {
    const child = walkParts(sub);
    if (!result.plain && child.plain) result.plain = child.plain;
    if (!result.html && child.html) result.html = child.html;
  }

  return result;
}

// ─── Header extraction helper ───

export function getHeader(
  headers: gmail_v1.Schema$MessagePartHeader[] | undefined | null,
  name: string,
): string {
  if (!headers) return "";
  const lower = name.toLowerCase();
  return headers.find((h) => h.name?.toLowerCase() === lower)?.value ?? "";
}

// ─── Full message parser ───

/**
 * Parse a raw Gmail API `Schema$Message` (fetched with `format=full`) into
 * our domain `GmailMessage` type.
 *
 * Throws `MalformedContentError` when the id, payload or internalDate is
 * missing or unusable.
 */
export function parseMessage(msg: gmail_v1.Schema$Message): GmailMessage {
  if (!msg.id) {
    throw new MalformedContentError("Message has no id");
  }
  if (!msg.payload) {
    throw new MalformedContentError(`Message ${msg.id} has no payload`);
  }
  const internalDate = Number(msg.internalDate);
  if (!msg.internalDate || !Number.isFinite(internalDate)) {
    throw new MalformedContentError(
      `Message ${msg.id} has invalid internalDate ${JSON.stringify(msg.internalDate)}`,
    );
  }

  const headers = msg.payload.headers;
  const { plain, html } = walkParts(msg.payload);

  return {
    id: msg.id,
    threadId: msg.threadId ?? msg.id,
    labelIds: msg.labelIds ?? [],
    internalDate,
    from: getHeader(headers, "From"),
    to: getHeader(headers, "To"),
    subject: getHeader(headers, "Subject"),
    date: getHeader(headers, "Date"),
    bodyPlain: plain || undefined,
    bodyHtml: html || undefined,
    snippet: msg.snippet ?? "",
  };
}

// ─── Body to text ───

/**
 * Readable body of a parsed message.
 *
 * Priority:
 *   1. text/plain
 *   2. text/html   (converted via turndown)
 *   3. Gmail snippet (last resort)
 */
export function bodyText(msg: GmailMessage): string {
  if (msg.bodyPlain?.trim()) {
    return msg.bodyPlain;
  }
  if (msg.bodyHtml) {
    return turndown.turndown(msg.bodyHtml);
  }
  return msg.snippet;
}
