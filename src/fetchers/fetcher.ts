/**
 * Data Fetcher
 *
 * Common lifecycle for anything read from the tracker:
 * validate → check cache → retrieve → cache.
 */

import { MetricsError, SourceUnavailableError, errorMessage } from "../errors.js";
import { moduleLogger, type Logger } from "../logger.js";

export interface DataFetcherOptions {
  /** Skip cache reads for every call unless a call says otherwise. */
  forceUpdate?: boolean;
  log?: Logger;
}

export interface FetchOptions {
  /** Skip cache reads for this call. Fresh results are still cached. */
  forceUpdate?: boolean;
}

/** Domain errors pass through; anything else means the source failed. */
function toSourceError(step: string, err: unknown): MetricsError {
  if (err instanceof MetricsError) return err;
  return new SourceUnavailableError(`${step} failed: ${errorMessage(err)}`, err);
}

/**
 * @typeParam TParams - what callers pass in
 * @typeParam TQuery - the validated form of the parameters
 * @typeParam TResult - what a fetch returns
 */
export abstract class DataFetcher<TParams, TQuery, TResult> {
  protected readonly log: Logger;
  private readonly defaultForceUpdate: boolean;
  private recent: TResult | undefined;

  constructor(options: DataFetcherOptions = {}) {
    this.defaultForceUpdate = options.forceUpdate ?? false;
    this.log = options.log ?? moduleLogger("fetcher");
  }

  /** Result of the last successful fetch, if any. */
  get recentData(): TResult | undefined {
    return this.recent;
  }

  async fetch(params: TParams, options: FetchOptions = {}): Promise<TResult> {
    const query = this.validateInput(params);
    const forceUpdate = options.forceUpdate ?? this.defaultForceUpdate;

    if (!forceUpdate) {
      let cached: TResult | null;
      try {
        cached = await this.getCachedData(query);
      } catch (err: unknown) {
        throw toSourceError("Cache lookup", err);
      }
      if (cached !== null) {
        this.log.debug("Serving cached data");
        this.recent = cached;
        return cached;
      }
    }

    let result: TResult;
    try {
      result = await this.retrieve(query, forceUpdate);
    } catch (err: unknown) {
      throw toSourceError("Retrieval", err);
    }

    await this.cacheData(query, result);
    this.recent = result;
    return result;
  }

  /**
   * Check the parameters and turn them into a query.
   * Throws {@link InvalidParametersError} for incomplete or contradictory input.
   */
  protected abstract validateInput(params: TParams): TQuery;

  /** Ask the source for fresh data. `forceUpdate` reaches nested cache reads. */
  protected abstract retrieve(query: TQuery, forceUpdate: boolean): Promise<TResult>;

  /**
   * A usable cached result, or null. May consult the source (e.g. to
   * resolve what to look up); failures are reported like retrieval failures.
   */
  protected async getCachedData(_query: TQuery): Promise<TResult | null> {
    return null;
  }

  protected async cacheData(_query: TQuery, _result: TResult): Promise<void> {
    // nothing cached by default
  }
}
