import type { gmail_v1 } from "googleapis";
import type { RowRecord, Transformer } from "../core/index.js";
import { createRowRecord } from "../core/index.js";
import { bodyText, parseMessage } from "./mime.js";

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** `YYYY-MM-DD HH:MM:SS UTC` for a Unix-ms timestamp. */
export function formatReceivedAt(epochMs: number): string {
  const d = new Date(epochMs);
  return (
    `${d.getUTCFullYear()}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())} ` +
    `${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}:${pad(d.getUTCSeconds())} UTC`
  );
}

export function messageToRow(raw: gmail_v1.Schema$Message): RowRecord {
  const msg = parseMessage(raw);
  return createRowRecord({
    from: msg.from,
    subject: msg.subject,
    date: formatReceivedAt(msg.internalDate),
    content: bodyText(msg),
  });
}

export const gmailTransformer: Transformer<gmail_v1.Schema$Message> = {
  transform: messageToRow,
};
