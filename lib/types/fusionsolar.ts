/**
 * FusionSolar realtime-data shapes
 *
 * Schemas are the source of truth; types are derived with z.infer<>.
 */
import { z } from "zod";

/**
 * Cookie record as exported from a logged-in browser session
 */
export const CookieRecordSchema = z.object({
  name: z.string().min(1),
  value: z.string(),
  domain: z.string().min(1),
  path: z.string().optional(),
  secure: z.boolean().optional(),
  httpOnly: z.boolean().optional(),
});

export type CookieRecord = Readonly<z.infer<typeof CookieRecordSchema>>;

export const CookieFileSchema = z.array(CookieRecordSchema);

/**
 * One named measurement, e.g. "Grid voltage".
 * realValue arrives as a string, occasionally as a bare number.
 */
export const SignalSchema = z.object({
  name: z.string(),
  realValue: z.union([z.string(), z.number().transform(String)]),
  unit: z.string().nullish().transform((unit) => unit ?? ""),
  value: z
    .union([z.string(), z.number().transform(String)])
    .nullish()
    .transform((value) => value ?? ""),
  latestTime: z.number().int().nullish().transform((time) => time ?? 0),
});

export type Signal = Readonly<z.infer<typeof SignalSchema>>;

// Groups carry other fields (id, name, ...) we do not read
export const SignalGroupSchema = z.object({
  signals: z.array(SignalSchema).optional(),
});

export const TelemetryPayloadSchema = z.object({
  buildCode: z.string(),
  success: z.boolean(),
  failCode: z.number().int(),
  data: z.array(SignalGroupSchema),
});

export type TelemetryPayload = Readonly<z.infer<typeof TelemetryPayloadSchema>>;

/**
 * Power figures of the primary device, in watts
 */
export interface PowerReading {
  activePower: number;
  consumption: number;
  gridPower: number;
}
