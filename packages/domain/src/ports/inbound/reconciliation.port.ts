// ---------------------------------------------------------------------------
// Tick summaries
// ---------------------------------------------------------------------------

export interface IngestSummary {
  polled: boolean;
  fetchFailed: boolean;
  reportsReceived: number;
  observationsAdded: number;
  duplicatesIgnored: number;
  storeErrors: number;
}

export interface DeliverySummary {
  pendingSeen: number;
  delivered: number;
  failed: number;
  /** (device, endpoint) pairs whose pending set could not be read. */
  pairErrors: number;
}

export interface TickSummary {
  ingest: IngestSummary;
  delivery: DeliverySummary;
}

// ---------------------------------------------------------------------------
// Port
// ---------------------------------------------------------------------------

export interface ReconciliationPort {
  ingest(signal?: AbortSignal): Promise<IngestSummary>;
  deliver(signal?: AbortSignal): Promise<DeliverySummary>;
  tick(signal?: AbortSignal): Promise<TickSummary>;
  /** Runs ticks until `signal` aborts. */
  run(signal: AbortSignal): Promise<void>;
}
