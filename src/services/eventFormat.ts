/**
 * Event framing — builds `text/event-stream` records.
 *
 * Wire format:
 *   id: <id>\r\n
 *   event: <type>\r\n
 *   data: <line>\r\n      (one per payload line)
 *   retry: <ms>\r\n
 *   \r\n
 *
 * Comment lines start with ":" and are ignored by EventSource, which makes
 * them usable as keep-alive pings.
 */

import { ValidationError } from "./errors.js";

export const LINE_SEPARATOR = "\r\n";

const LINE_BREAK = /\r\n|\r|\n/;
const LINE_BREAKS = /\r\n|\r|\n/g;

export interface EventFields {
  /** Sets the client's last event ID */
  id?: string;
  /** Event type dispatched to `addEventListener`; clients default to "message" */
  event?: string;
  /** Reconnection delay in milliseconds, must be an integer */
  retry?: number;
}

function singleLine(field: string, value: string): string {
  return `${field}: ${value}`.replace(LINE_BREAKS, "") + LINE_SEPARATOR;
}

export function formatEvent(data: string, fields: EventFields = {}): Buffer {
  const { id, event, retry } = fields;

  if (retry !== undefined && !Number.isInteger(retry)) {
    throw new ValidationError("retry must be an integer number of milliseconds");
  }

  let frame = "";
  if (id !== undefined) frame += singleLine("id", id);
  if (event !== undefined) frame += singleLine("event", event);

  for (const line of data.split(LINE_BREAK)) {
    frame += `data: ${line}${LINE_SEPARATOR}`;
  }

  if (retry !== undefined) frame += `retry: ${retry}${LINE_SEPARATOR}`;
  frame += LINE_SEPARATOR;

  return Buffer.from(frame, "utf-8");
}

export function formatComment(text: string): Buffer {
  return Buffer.from(`: ${text}`.replace(LINE_BREAKS, "") + LINE_SEPARATOR + LINE_SEPARATOR, "utf-8");
}

export const PING_FRAME = formatComment("ping");
