/**
 * One record handed over by an ingestion source.
 *
 * `body` is unvalidated; the orchestrator parses it with `inputSchema`.
 * `receipt` is the source's own handle (a stream entry id, for example)
 * and is passed back to `acknowledge()` untouched.
 */
export interface IngestedRecord {
  readonly receipt: string | null;
  readonly body: unknown;
}

/**
 * Where new units of work come from.
 *
 * `poll()` may reject; the orchestrator logs the failure and polls again
 * on its next cycle. `acknowledge()` is called once the records of a
 * poll have been absorbed, valid or not, so that a source with
 * redelivery semantics can release them.
 */
export interface IngestionSource {
  readonly name: string;
  poll(max: number): Promise<IngestedRecord[]>;
  acknowledge?(records: readonly IngestedRecord[]): Promise<void>;
}
