import { z } from "zod";

export interface CotXmlElement {
  name: string;
  attributes: Record<string, string>;
  children: CotXmlElement[];
  text?: string;
}

export const cotXmlElementSchema: z.ZodType<CotXmlElement> = z.lazy(() =>
  z.object({
    name: z.string().min(1),
    attributes: z.record(z.string(), z.string()),
    children: z.array(cotXmlElementSchema),
    text: z.string().optional(),
  }),
);

const coordinate = z.number().finite();

export const cotPointSchema = z.object({
  lat: coordinate.min(-90).max(90),
  lon: coordinate.min(-180).max(180),
  hae: coordinate,
  ce: coordinate,
  le: coordinate,
});

/**
 * A Cursor-on-Target event. Timestamps stay as the wire strings so that
 * decoding and re-encoding never shifts precision.
 */
export const cotEventSchema = z.object({
  version: z.string().min(1),
  type: z.string().min(1),
  uid: z.string().min(1),
  how: z.string().min(1),
  time: z.string().min(1),
  start: z.string().min(1),
  stale: z.string().min(1),
  access: z.string().optional(),
  qos: z.string().optional(),
  opex: z.string().optional(),
  point: cotPointSchema,
  detail: z.array(cotXmlElementSchema),
});

export type CotPoint = z.infer<typeof cotPointSchema>;
export type CotEvent = z.infer<typeof cotEventSchema>;
