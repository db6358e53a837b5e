/**
 * Edge Telemetry Relay Type Definitions
 *
 * Core types for records, the offline queue, link state and status reporting.
 */

// ═══════════════════════════════════════════════════════════════════════════════
// RECORD TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/** Any JSON value a sensor payload may carry */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/** One decoded sensor reading or alarm event (opaque field → value map) */
export type TelemetryRecord = { [field: string]: JsonValue };

/** Metadata the relay attaches to every forwarded record */
export type EdgeMetadata = {
  edge_id: string;
  edge_name: string;
  edge_location: string;
  /** ISO-8601 receipt time at the edge */
  received_at: string;
};

/** A record after the local link has stamped it */
export type StampedRecord = TelemetryRecord & EdgeMetadata;

/** The single record a flushed batch is converted into */
export type BatchRecord = {
  edge_id: string;
  edge_name: string;
  edge_location: string;
  batch_size: number;
  /** ISO-8601 flush time */
  batch_time: string;
  readings: StampedRecord[];
};

// ═══════════════════════════════════════════════════════════════════════════════
// OFFLINE QUEUE TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Queue entry status.
 * Only "pending" is ever persisted; "in_flight" is reserved for a
 * crash-safe variant and never written today.
 */
export type QueueEntryStatus = "pending" | "in_flight";

/** Pending outbound record held in the durable queue */
export interface QueueEntry {
  /** Store-assigned, monotonically increasing */
  id: number;
  targetTopic: string;
  payload: TelemetryRecord;
  enqueuedAt: Date;
  status: QueueEntryStatus;
}

// ═══════════════════════════════════════════════════════════════════════════════
// DISPATCH TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/** realtime: forward each record at once; batched: accumulate and flush */
export type DispatchMode = "realtime" | "batched";

// ═══════════════════════════════════════════════════════════════════════════════
// LINK TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/** Connection state of one broker link */
export type LinkState = "disconnected" | "connecting" | "connected";

/** Which broker a link talks to */
export type LinkName = "local" | "cloud";

/** Event types emitted by a broker connection */
export type LinkEvent =
  | "connected"
  | "disconnected"
  | "state_change"
  | "message"
  | "error";

export interface LinkStateChange {
  link: LinkName;
  previousState: LinkState;
  currentState: LinkState;
  timestamp: Date;
}

export interface LinkMessage {
  topic: string;
  payload: Buffer;
}

// ═══════════════════════════════════════════════════════════════════════════════
// STATUS TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/** Advisory process-wide counters */
export interface RelayStatsSnapshot {
  readingsReceived: number;
  readingsSent: number;
  readingsQueued: number;
  alarmsForwarded: number;
  decodeErrors: number;
  queueWriteFailures: number;
  connectionErrors: number;
  commandsForwarded: number;
  lastSyncAt: Date | null;
}

/** Read-only snapshot for operational monitoring */
export interface RelayStatus {
  running: boolean;
  localConnection: LinkState;
  cloudConnection: LinkState;
  batchBufferSize: number;
  offlineQueueSize: number;
  stats: RelayStatsSnapshot;
  config: {
    edgeId: string;
    localBroker: string;
    cloudBroker: string;
    mode: DispatchMode;
    batchSize: number;
    batchTimeoutMs: number;
  };
}
