import { randomUUID } from "node:crypto";
import {
  DEFAULT_COT_STALE,
  DEFAULT_COT_VAL,
  DEFAULT_HOST_ID,
} from "./constants";
import type { CotEvent, CotXmlElement } from "./schema/cot";

export type { CotEvent, CotPoint, CotXmlElement } from "./schema/cot";

/** Type used by takPing/takPong and delete instructions. */
export const PING_TYPE = "t-x-d-d";

/**
 * W3C XML Schema dateTime in UTC with six fractional digits, e.g.
 * `2024-05-01T12:00:00.123000Z`. `offsetSeconds` shifts the instant, which is
 * how stale deadlines are produced.
 */
export function cotTime(offsetSeconds = 0, now: Date = new Date()): string {
  const shifted = new Date(now.getTime() + offsetSeconds * 1000);
  return shifted.toISOString().replace(/\.(\d{3})Z$/, ".$1000Z");
}

export interface TimestampTriad {
  time: string;
  start: string;
  stale: string;
}

export function timestampTriad(
  staleSeconds: number = DEFAULT_COT_STALE,
  now: Date = new Date(),
): TimestampTriad {
  const time = cotTime(0, now);
  return { time, start: time, stale: cotTime(staleSeconds, now) };
}

export const xmlElement = (
  name: string,
  attributes: Record<string, string> = {},
  children: CotXmlElement[] = [],
  text?: string,
): CotXmlElement =>
  text === undefined
    ? { name, attributes, children }
    : { name, attributes, children, text };

export interface CreateCotEventOptions {
  type?: string;
  uid?: string;
  how?: string;
  lat?: number;
  lon?: number;
  hae?: number;
  ce?: number;
  le?: number;
  /** Seconds until the event goes stale. */
  stale?: number;
  callsign?: string;
  /** Extra detail elements appended after the flow tags and contact. */
  detail?: CotXmlElement[];
  hostId?: string;
  now?: Date;
}

const flowTag = (hostId: string, now: Date): CotXmlElement =>
  xmlElement("_flow-tags_", {
    [`${hostId}-cotwire`.replace(/@/g, "-")]: cotTime(0, now),
  });

/** Builds a minimal position event with the standard defaults filled in. */
export function createCotEvent(options: CreateCotEventOptions = {}): CotEvent {
  const now = options.now ?? new Date();
  const hostId = options.hostId ?? DEFAULT_HOST_ID;
  const detail: CotXmlElement[] = [flowTag(hostId, now)];
  if (options.callsign) {
    detail.push(xmlElement("contact", { callsign: options.callsign }));
  }
  detail.push(...(options.detail ?? []));

  return {
    version: "2.0",
    type: options.type ?? "a-u-G",
    uid: options.uid ?? hostId,
    how: options.how ?? "m-g",
    ...timestampTriad(options.stale ?? DEFAULT_COT_STALE, now),
    point: {
      lat: options.lat ?? 0,
      lon: options.lon ?? 0,
      hae: options.hae ?? DEFAULT_COT_VAL,
      ce: options.ce ?? DEFAULT_COT_VAL,
      le: options.le ?? DEFAULT_COT_VAL,
    },
    detail,
  };
}

/** Greeting sent once when a pipeline starts. */
export function helloEvent(uid = "takPing", now: Date = new Date()): CotEvent {
  return createCotEvent({
    uid,
    type: PING_TYPE,
    hostId: uid,
    now,
  });
}

export function pongEvent(now: Date = new Date()): CotEvent {
  return {
    version: "2.0",
    type: PING_TYPE,
    uid: "takPong",
    how: "m-g",
    ...timestampTriad(3600, now),
    point: {
      lat: 0,
      lon: 0,
      hae: DEFAULT_COT_VAL,
      ce: DEFAULT_COT_VAL,
      le: DEFAULT_COT_VAL,
    },
    detail: [],
  };
}

export interface DeleteEventOptions {
  /** CoT type of the event being retracted. */
  targetType?: string;
  uid?: string;
  stale?: number;
  now?: Date;
}

/**
 * Instructs receivers to drop a previously sent event by uid instead of
 * waiting for its stale time.
 */
export function deleteEvent(
  targetUid: string,
  options: DeleteEventOptions = {},
): CotEvent {
  const now = options.now ?? new Date();
  return {
    version: "2.0",
    type: PING_TYPE,
    uid: options.uid ?? randomUUID(),
    how: "h-g-i-g-o",
    ...timestampTriad(options.stale ?? 20, now),
    point: {
      lat: 0,
      lon: 0,
      hae: DEFAULT_COT_VAL,
      ce: DEFAULT_COT_VAL,
      le: DEFAULT_COT_VAL,
    },
    detail: [
      xmlElement("link", {
        uid: targetUid,
        relation: "none",
        type: options.targetType ?? "a-f-G",
      }),
      xmlElement("__forcedelete"),
    ],
  };
}
