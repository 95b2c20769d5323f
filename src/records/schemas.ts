import { z } from "zod";

import { RecordValidationError } from "../errors.js";

/**
 * Canonicalises enum labels coming from spreadsheets and shapefile attributes:
 * trims, lower-cases and turns spaces or hyphens into underscores, so
 * `"Semi-Aerial"` and `"semi aerial"` both read as `semi_aerial`. Anything that
 * still does not match the enum is rejected by the schema.
 */
function normaliseLabel(raw: string): string {
  return raw.trim().toLowerCase().replace(/[\s-]+/g, "_");
}

function labelled<Schema extends z.ZodTypeAny>(schema: Schema) {
  return z.preprocess((raw) => (typeof raw === "string" ? normaliseLabel(raw) : raw), schema);
}

const BuildingTypeSchema = z.enum(["residential", "school", "hospital", "commercial"]);
const PrioritySchema = z.enum(["high", "medium", "low"]);
const InfrastructureTypeSchema = z.enum(["aerial", "semi_aerial", "duct"]);
const InfrastructureStateSchema = z.enum(["intact", "to_replace"]);
const SegmentStatusSchema = z.enum(["active", "damaged"]);

export const BUILDING_TYPES = BuildingTypeSchema.options;
export const PRIORITIES = PrioritySchema.options;
export const INFRASTRUCTURE_TYPES = InfrastructureTypeSchema.options;

export type BuildingType = z.infer<typeof BuildingTypeSchema>;
export type Priority = z.infer<typeof PrioritySchema>;
export type InfrastructureType = z.infer<typeof InfrastructureTypeSchema>;
export type InfrastructureState = z.infer<typeof InfrastructureStateSchema>;

const identifier = z.string().trim().min(1).max(200);
const nonNegative = z.number().finite().nonnegative();
const count = z.number().int().nonnegative();
const position = z.object({ x: z.number().finite(), y: z.number().finite() });

export const BuildingRecordSchema = z.object({
  id: identifier,
  inhabitants: count,
  building_type: labelled(BuildingTypeSchema),
  priority: labelled(PrioritySchema),
  connected: z.boolean(),
  cost: nonNegative,
  distance: nonNegative,
});

export const InfrastructureRecordSchema = z.object({
  id: identifier,
  building_id: identifier,
  type: labelled(InfrastructureTypeSchema),
  state: labelled(InfrastructureStateSchema),
  length: nonNegative,
  houses_served: count,
});

export const SegmentRecordSchema = z.object({
  id: identifier,
  endpoint_a: identifier,
  endpoint_b: identifier,
  length: nonNegative,
  status: labelled(SegmentStatusSchema).default("active"),
  capacity: nonNegative.optional(),
});

export const NetworkPointRecordSchema = z.object({
  id: identifier,
  position,
});

export const SubstationRecordSchema = z.object({
  id: identifier,
  position,
  capacity: nonNegative.optional(),
  name: z.string().trim().min(1).optional(),
});

/** Building as placed on the map, used to attach it to the network graph. */
export const BuildingSiteRecordSchema = z.object({
  id: identifier,
  position,
  inhabitants: count,
  connected: z.boolean(),
});

export type BuildingRecord = z.infer<typeof BuildingRecordSchema>;
export type InfrastructureRecord = z.infer<typeof InfrastructureRecordSchema>;
export type SegmentRecord = z.infer<typeof SegmentRecordSchema>;
export type NetworkPointRecord = z.infer<typeof NetworkPointRecordSchema>;
export type SubstationRecord = z.infer<typeof SubstationRecordSchema>;
export type BuildingSiteRecord = z.infer<typeof BuildingSiteRecordSchema>;

/** Either a validated record or the reason it was refused. */
export type RecordResult<T> = { ok: true; value: T } | { ok: false; error: RecordValidationError };

export type RecordParser<T> = (raw: unknown) => RecordResult<T>;

function rawIdentifier(raw: unknown): string | null {
  if (typeof raw === "object" && raw !== null && "id" in raw) {
    const id = raw.id;
    if (typeof id === "string" || typeof id === "number") {
      return String(id);
    }
  }
  return null;
}

function createParser<Schema extends z.ZodTypeAny>(kind: string, schema: Schema): RecordParser<z.infer<Schema>> {
  return (raw) => {
    const parsed = schema.safeParse(raw);
    if (parsed.success) {
      return { ok: true, value: parsed.data };
    }
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
    );
    return { ok: false, error: new RecordValidationError(kind, rawIdentifier(raw), issues) };
  };
}

export const parseBuildingRecord = createParser("building", BuildingRecordSchema);
export const parseInfrastructureRecord = createParser("infrastructure", InfrastructureRecordSchema);
export const parseSegmentRecord = createParser("segment", SegmentRecordSchema);
export const parseNetworkPointRecord = createParser("network_point", NetworkPointRecordSchema);
export const parseSubstationRecord = createParser("substation", SubstationRecordSchema);
export const parseBuildingSiteRecord = createParser("building_site", BuildingSiteRecordSchema);

export interface PartitionedRecords<T> {
  accepted: T[];
  rejected: RecordValidationError[];
}

/**
 * Validates a batch at the ingestion boundary. Records whose identifier was
 * already accepted are refused so identifiers stay unique downstream.
 */
export function partitionRecords<T extends { id: string }>(
  raws: readonly unknown[],
  parse: RecordParser<T>,
  kind: string,
): PartitionedRecords<T> {
  const accepted: T[] = [];
  const rejected: RecordValidationError[] = [];
  const seen = new Set<string>();

  for (const raw of raws) {
    const result = parse(raw);
    if (!result.ok) {
      rejected.push(result.error);
      continue;
    }
    if (seen.has(result.value.id)) {
      rejected.push(new RecordValidationError(kind, result.value.id, ["duplicate identifier"]));
      continue;
    }
    seen.add(result.value.id);
    accepted.push(result.value);
  }

  return { accepted, rejected };
}
