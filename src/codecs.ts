import { XMLBuilder, XMLParser } from "fast-xml-parser";
import type { Logger } from "pino";
import { XML_DECLARATION } from "./constants";
import type { Destination } from "./destination";
import { xmlElement } from "./events";
import {
  TAK_MAGIC,
  unwrapTakPayload,
  wrapTakPayload,
  type TakProtocolVariant,
} from "./framing";
import { cotEventSchema, type CotEvent, type CotXmlElement } from "./schema/cot";

export type ProtocolVersion = 0 | 1;

/** Anything the transmit path accepts: an event or pre-encoded bytes. */
export type OutboundItem = CotEvent | Buffer;
/** Anything the receive path yields: a decoded event or the raw frame. */
export type InboundItem = CotEvent | Buffer;

/**
 * Protocol-1 payload codec (the protobuf TakMessage body). The header bytes
 * are handled here; installed codecs only see the payload.
 */
export interface BinaryCodec {
  encodePayload(event: CotEvent): Buffer;
  decodePayload(payload: Buffer): CotEvent | null;
}

export interface CodecOptions {
  protocolVersion: ProtocolVersion;
  variant?: TakProtocolVariant;
  codec?: BinaryCodec;
}

const ATTR_PREFIX = "@_";
const ATTRIBUTES_KEY = ":@";
const TEXT_KEY = "#text";

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: ATTR_PREFIX,
  preserveOrder: true,
  parseTagValue: false,
  parseAttributeValue: false,
  ignoreDeclaration: true,
  ignorePiTags: true,
  processEntities: true,
  trimValues: false,
});

const builder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: ATTR_PREFIX,
  preserveOrder: true,
  suppressEmptyNode: true,
  processEntities: true,
  format: false,
});

type XmlNode = Record<string, unknown>;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const toProtocolVersion = (value: number): ProtocolVersion =>
  value === 1 ? 1 : 0;

/**
 * Multicast destinations use the mesh header; everything else, including
 * unicast UDP, uses the length-prefixed stream header.
 */
export const takProtocolVariant = (
  destination: Pick<Destination, "multicast">,
): TakProtocolVariant => (destination.multicast ? "mesh" : "stream");

/** Falls back to XML when protocol 1 is requested but no codec is installed. */
export function negotiateProtocolVersion(
  requested: number,
  codec: BinaryCodec | undefined,
  log?: Logger,
): ProtocolVersion {
  const version = toProtocolVersion(requested);
  if (version === 1 && !codec) {
    log?.warn(
      { requested },
      "TAK protocol 1 requested but no binary codec is installed; using XML (protocol 0)",
    );
    return 0;
  }
  return version;
}

const attributesToNode = (attributes: Record<string, string>): XmlNode => {
  const node: XmlNode = {};
  for (const [name, value] of Object.entries(attributes)) {
    node[`${ATTR_PREFIX}${name}`] = value;
  }
  return node;
};

const elementToNode = (element: CotXmlElement): XmlNode => {
  const children: XmlNode[] = [];
  if (element.text !== undefined) children.push({ [TEXT_KEY]: element.text });
  children.push(...element.children.map(elementToNode));
  const node: XmlNode = { [element.name]: children };
  if (Object.keys(element.attributes).length > 0) {
    node[ATTRIBUTES_KEY] = attributesToNode(element.attributes);
  }
  return node;
};

const eventToElement = (event: CotEvent): CotXmlElement => {
  const attributes: Record<string, string> = {
    version: event.version,
    uid: event.uid,
    type: event.type,
    how: event.how,
    time: event.time,
    start: event.start,
    stale: event.stale,
  };
  if (event.access !== undefined) attributes.access = event.access;
  if (event.qos !== undefined) attributes.qos = event.qos;
  if (event.opex !== undefined) attributes.opex = event.opex;

  return xmlElement("event", attributes, [
    xmlElement("point", {
      lat: String(event.point.lat),
      lon: String(event.point.lon),
      hae: String(event.point.hae),
      ce: String(event.point.ce),
      le: String(event.point.le),
    }),
    xmlElement("detail", {}, event.detail),
  ]);
};

/** Serializes an event as a self-delimited XML document. */
export function eventToXml(event: CotEvent): Buffer {
  const body: string = builder.build([elementToNode(eventToElement(event))]);
  return Buffer.from(`${XML_DECLARATION}\n${body}`, "utf8");
}

const nodeAttributes = (raw: unknown): Record<string, string> => {
  const attributes: Record<string, string> = {};
  if (!isRecord(raw)) return attributes;
  for (const [key, value] of Object.entries(raw)) {
    if (key.startsWith(ATTR_PREFIX)) {
      attributes[key.slice(ATTR_PREFIX.length)] = String(value);
    }
  }
  return attributes;
};

/**
 * Text is kept verbatim, except that whitespace-only text beside child
 * elements is indentation and is dropped.
 */
const nodesToElements = (
  nodes: unknown,
): { elements: CotXmlElement[]; text?: string } => {
  const elements: CotXmlElement[] = [];
  let text: string | undefined;
  if (!Array.isArray(nodes)) return { elements };
  for (const node of nodes) {
    if (!isRecord(node)) continue;
    for (const [key, value] of Object.entries(node)) {
      if (key === ATTRIBUTES_KEY) continue;
      if (key === TEXT_KEY) {
        text = (text ?? "") + String(value);
        continue;
      }
      const inner = nodesToElements(value);
      elements.push(
        xmlElement(key, nodeAttributes(node[ATTRIBUTES_KEY]), inner.elements, inner.text),
      );
    }
  }
  if (text === undefined || (elements.length > 0 && text.trim() === "")) {
    return { elements };
  }
  return { elements, text };
};

/** Parses XML into generic elements; throws on malformed markup. */
export function parseXmlElements(xml: string | Buffer): CotXmlElement[] {
  const parsed: unknown = parser.parse(
    typeof xml === "string" ? xml : xml.toString("utf8"),
  );
  return nodesToElements(parsed).elements;
}

/** Parses one XML event. Returns undefined when it is not a valid event. */
export function xmlToEvent(frame: Buffer): CotEvent | undefined {
  let elements: CotXmlElement[];
  try {
    elements = parseXmlElements(frame);
  } catch {
    return undefined;
  }
  const root = elements.find(element => element.name === "event");
  if (!root) return undefined;

  const attributes = root.attributes;
  const point = root.children.find(child => child.name === "point");
  const detail = root.children.find(child => child.name === "detail");
  const candidate: Record<string, unknown> = {
    version: attributes.version,
    type: attributes.type,
    uid: attributes.uid,
    how: attributes.how,
    time: attributes.time,
    start: attributes.start,
    stale: attributes.stale,
    point: point && {
      lat: Number(point.attributes.lat),
      lon: Number(point.attributes.lon),
      hae: Number(point.attributes.hae),
      ce: Number(point.attributes.ce),
      le: Number(point.attributes.le),
    },
    detail: detail?.children ?? [],
  };
  for (const optional of ["access", "qos", "opex"] as const) {
    if (attributes[optional] !== undefined) candidate[optional] = attributes[optional];
  }

  const result = cotEventSchema.safeParse(candidate);
  return result.success ? result.data : undefined;
}

/**
 * Serializes an event for the wire. Protocol 0 is XML; protocol 1 wraps the
 * codec's payload in the header of the active variant.
 */
export function encodeEvent(event: CotEvent, options: CodecOptions): Buffer {
  if (options.protocolVersion === 1 && options.codec) {
    return wrapTakPayload(
      options.codec.encodePayload(event),
      options.variant ?? "stream",
    );
  }
  return eventToXml(event);
}

/**
 * Encodes a queued item. Raw bytes pass through unchanged under protocol 0;
 * under protocol 1 XML bytes are converted when they parse as an event and
 * sent as-is otherwise.
 */
export function encodeOutbound(
  item: OutboundItem,
  options: CodecOptions,
  log?: Logger,
): Buffer {
  if (!Buffer.isBuffer(item)) return encodeEvent(item, options);
  if (options.protocolVersion === 0 || !options.codec) return item;
  if (item[0] === TAK_MAGIC) return item;
  const event = xmlToEvent(item);
  if (!event) {
    log?.warn(
      { bytes: item.length },
      "Could not convert queued XML to protocol 1; sending it unchanged",
    );
    return item;
  }
  return encodeEvent(event, options);
}

/**
 * Decodes one frame. XML is accepted under either protocol version; frames
 * that cannot be decoded are returned as raw bytes.
 */
export function decodeFrame(frame: Buffer, options: CodecOptions): InboundItem {
  if (frame[0] === TAK_MAGIC) {
    if (options.protocolVersion !== 1 || !options.codec) return frame;
    let payload: Buffer | undefined;
    try {
      payload = unwrapTakPayload(frame, options.variant ?? "stream");
    } catch {
      return frame;
    }
    if (!payload) return frame;
    return options.codec.decodePayload(payload) ?? frame;
  }
  return xmlToEvent(frame) ?? frame;
}

/**
 * Cross-thread queues deliver Buffers as plain Uint8Arrays; this restores the
 * queue item shape after structured cloning.
 */
export function reviveQueueItem(message: unknown): InboundItem | undefined {
  if (Buffer.isBuffer(message)) return message;
  if (message instanceof Uint8Array) {
    return Buffer.from(message.buffer, message.byteOffset, message.byteLength);
  }
  const result = cotEventSchema.safeParse(message);
  return result.success ? result.data : undefined;
}
