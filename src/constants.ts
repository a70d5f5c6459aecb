import os from "node:os";

/** ATAK's default mesh: write-only multicast on the SA group. */
export const DEFAULT_COT_URL = "udp+wo://239.2.3.1:6969";
export const DEFAULT_COT_STALE = 120;
/** One year; far larger offsets leave the range a `Date` can represent. */
export const MAX_COT_STALE = 365 * 24 * 60 * 60;
export const DEFAULT_HOST_ID = `cotwire@${os.hostname()}`;
export const DEFAULT_COT_PORT = 8087;
export const DEFAULT_BROADCAST_PORT = 6969;
export const DEFAULT_ENROLLMENT_PORT = 8446;

export const DEFAULT_SLEEP_SECONDS = 5;
export const DEFAULT_MAX_OUT_QUEUE = 100;
export const DEFAULT_MAX_IN_QUEUE = 500;
export const DEFAULT_QUEUE_GET_TIMEOUT_MS = 1_000;
export const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;
export const DEFAULT_MAX_FRAME_LENGTH = 8 * 1024 * 1024; // 8 MiB

export const DEFAULT_MULTICAST_LOCAL_ADDR = "0.0.0.0";
export const DEFAULT_MULTICAST_TTL = 1;

/** Placeholder for unknown hae/ce/le, per MIL-STD-6090 usage. */
export const DEFAULT_COT_VAL = 9999999.0;

export const XML_DECLARATION =
  '<?xml version="1.0" encoding="UTF-8" standalone="yes" ?>';
export const EVENT_END_TAG = "</event>";

export const BOOLEAN_TRUTH = ["true", "yes", "y", "on", "1"] as const;
