export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export type JsonObject = { [key: string]: JsonValue };

// One analytics event as stored by the collector. Immutable once stored.
export type EventRecord = {
  cursor: number;
  name: string;
  payload: JsonValue;
  // ms since epoch at ingestion, non-decreasing in cursor order
  receivedAt: number;
  sourceBatchId: number;
  remoteAddress: string;
};

export type BatchElement = {
  name: string;
  payload: JsonValue;
};

export type IncomingBatch = {
  remoteAddress: string;
  elements: BatchElement[];
};

export function isJsonObject(v: JsonValue | undefined): v is JsonObject {
  return v != null && typeof v === "object" && !Array.isArray(v);
}
