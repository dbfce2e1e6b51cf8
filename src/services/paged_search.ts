// Paged Search Engine
// Subtree searches driven page by page through the RFC 2696 Simple Paged Results control

import {
  DerefAliases,
  Filter,
  LDAPCodec,
  LDAPControl,
  LDAPMessage,
  LDAPMessageType,
  LDAPResultCode,
  LDAP_VERSION,
  PAGED_RESULTS_OID,
  resultCodeName,
  SearchResultDone,
  SearchScope,
} from "../protocol/ldap.ts";
import { parseFilter } from "../protocol/filter.ts";
import { Entry, ResultSet } from "../models/entry.ts";
import { SearchError, TooManyAttributesError } from "../models/errors.ts";
import { assertPageSize, DEFAULT_READER_CONFIG } from "../models/reader_config.ts";
import { ConnectionManager } from "./connection_manager.ts";
import { Logger } from "./logger.ts";
import { MetricsCollector } from "./metrics.ts";

export enum SearchPhase {
  Idle = "idle",
  PageRequested = "page_requested",
  PageReceived = "page_received",
  Exhausted = "exhausted",
}

export interface PageState {
  /** Continuation cookie from the last page; empty means no more pages. */
  cookie: Uint8Array;
  moreAvailable: boolean;
  /** Server's estimate of the total result size. Advisory only. */
  resultCount: number;
  pagesFetched: number;
  referencesSkipped: number;
}

/** Parameters of one query, fixed when the query starts. */
export interface FrozenSearch {
  readonly base: string;
  readonly filterText: string;
  readonly filter: Filter;
  readonly attributes: readonly string[];
}

export interface PagedSearchOptions {
  connections: ConnectionManager;
  logger: Logger;
  metrics?: MetricsCollector;
  pageSize?: number;
  pagingCritical?: boolean;
  maxAttributes?: number;
}

function initialPageState(): PageState {
  return { cookie: new Uint8Array(), moreAvailable: false, resultCount: 0, pagesFetched: 0, referencesSkipped: 0 };
}

export class PagedSearchEngine {
  private readonly connections: ConnectionManager;
  private readonly logger: Logger;
  private readonly metrics?: MetricsCollector;

  private size: number;
  private critical: boolean;
  readonly maxAttributes: number;

  private currentPhase = SearchPhase.Idle;
  private state: PageState = initialPageState();
  private request: FrozenSearch | null = null;
  private results: ResultSet | null = null;
  private queryCounter = 0;
  private queryLogger: Logger;

  constructor(options: PagedSearchOptions) {
    this.connections = options.connections;
    this.logger = options.logger.child({ component: "search" });
    this.queryLogger = this.logger;
    this.metrics = options.metrics;

    this.size = DEFAULT_READER_CONFIG.pageSize;
    this.critical = options.pagingCritical ?? DEFAULT_READER_CONFIG.pagingCritical;
    this.maxAttributes = options.maxAttributes ?? DEFAULT_READER_CONFIG.maxAttributes;
    if (options.pageSize !== undefined) {
      this.setPageSize(options.pageSize);
    }
  }

  get phase(): SearchPhase {
    return this.currentPhase;
  }

  get pageSize(): number {
    return this.size;
  }

  get pagingCritical(): boolean {
    return this.critical;
  }

  get pageState(): PageState {
    return { ...this.state, cookie: this.state.cookie.slice() };
  }

  get moreAvailable(): boolean {
    return this.state.moreAvailable;
  }

  get resultSet(): ResultSet | null {
    return this.results;
  }

  get activeSearch(): FrozenSearch | null {
    return this.request;
  }

  /** Sequence number of the current query, starting at 1; 0 before the first. */
  get queryId(): number {
    return this.queryCounter;
  }

  /** Takes effect from the next page request. */
  setPageSize(size: number): void {
    assertPageSize(size);
    this.size = size;
  }

  setPagingCritical(critical: boolean): void {
    this.critical = critical;
  }

  /**
   * Start a new query and fetch its first page. Any previous result set is invalidated.
   */
  async query(filterText: string, base: string, attributeNames: readonly string[] = []): Promise<void> {
    if (attributeNames.length > this.maxAttributes) {
      throw new TooManyAttributesError(attributeNames.length, this.maxAttributes);
    }

    const connection = this.connections.requireConnection();

    let filter: Filter;
    try {
      filter = parseFilter(filterText);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new SearchError(`Invalid search filter "${filterText}": ${reason}`, undefined, { cause: err });
    }

    if (connection.protocolVersion !== LDAP_VERSION) {
      throw new SearchError(
        `Paged search needs protocol version ${LDAP_VERSION}, connection uses ${connection.protocolVersion}`,
      );
    }

    this.discardResults();
    this.request = Object.freeze({
      base,
      filterText,
      filter,
      attributes: Object.freeze([...attributeNames]),
    });
    this.state = initialPageState();
    this.queryCounter++;
    this.queryLogger = this.logger.child({ queryId: this.queryCounter });
    this.metrics?.recordSearchQuery();
    this.queryLogger.debug("Query started", {
      base,
      filter: filterText,
      attributes: attributeNames.length,
      pageSize: this.size,
      critical: this.critical,
    });

    await this.executePage();
  }

  /**
   * Request the next page of the current query. Resolves false without contacting the
   * server when there is no query or the last page has already arrived.
   */
  async fetchNextPage(): Promise<boolean> {
    if (!this.request || !this.state.moreAvailable) {
      return false;
    }
    await this.executePage();
    return true;
  }

  private async executePage(): Promise<void> {
    const request = this.request;
    if (!request) {
      throw new SearchError("No query in progress");
    }

    const page = this.state.pagesFetched + 1;
    this.discardResults();
    this.currentPhase = SearchPhase.PageRequested;

    try {
      const connection = this.connections.requireConnection();
      const control: LDAPControl = {
        controlType: PAGED_RESULTS_OID,
        criticality: this.critical,
        controlValue: LDAPCodec.encodePagedResultsValue(this.size, this.state.cookie),
      };

      const messages = await connection.exchange({
        type: LDAPMessageType.SearchRequest,
        baseObject: request.base,
        scope: SearchScope.WholeSubtree,
        derefAliases: DerefAliases.NeverDerefAliases,
        sizeLimit: 0,
        timeLimit: 0,
        typesOnly: false,
        filter: request.filter,
        attributes: [...request.attributes],
      }, [control]);

      this.receivePage(messages);
    } catch (err) {
      this.discardQuery();
      this.metrics?.recordError("search");
      this.queryLogger.error("Page request failed", err, { page });
      if (err instanceof SearchError) throw err;
      const reason = err instanceof Error ? err.message : String(err);
      throw new SearchError(`Search failed: ${reason}`, undefined, { cause: err });
    }
  }

  private receivePage(messages: LDAPMessage[]): void {
    const entries: Entry[] = [];
    let references = 0;
    let done: SearchResultDone | null = null;
    let doneControls: LDAPControl[] = [];

    for (const message of messages) {
      const op = message.protocolOp;
      switch (op.type) {
        case LDAPMessageType.SearchResultEntry:
          entries.push(new Entry(op));
          break;
        case LDAPMessageType.SearchResultReference:
          references++;
          break;
        case LDAPMessageType.SearchResultDone:
          done = op;
          doneControls = message.controls ?? [];
          break;
        default:
          throw new SearchError(`Unexpected ${LDAPMessageType[op.type]} in search response`);
      }
    }

    if (!done) {
      throw new SearchError("Search response ended without SearchResultDone");
    }
    if (done.resultCode !== LDAPResultCode.Success) {
      throw new SearchError(
        done.diagnosticMessage || `Search failed: ${resultCodeName(done.resultCode)}`,
        done.resultCode,
      );
    }

    const pagingControl = doneControls.find((c) => c.controlType === PAGED_RESULTS_OID);
    let cookie: Uint8Array = new Uint8Array();
    let resultCount = 0;
    if (pagingControl?.controlValue) {
      const value = LDAPCodec.decodePagedResultsValue(pagingControl.controlValue);
      cookie = value.cookie;
      resultCount = value.size;
    } else if (this.critical) {
      throw new SearchError("Server does not support paged results");
    } else {
      this.queryLogger.warn("Server ignored the paging control; treating the result as a single page");
    }

    this.state = {
      cookie,
      moreAvailable: cookie.length > 0,
      resultCount,
      pagesFetched: this.state.pagesFetched + 1,
      referencesSkipped: this.state.referencesSkipped + references,
    };
    this.results = new ResultSet(entries, this.state.pagesFetched);
    this.currentPhase = this.state.moreAvailable ? SearchPhase.PageReceived : SearchPhase.Exhausted;
    this.metrics?.recordSearchPage(entries.length, references);

    this.queryLogger.debug("Page received", {
      page: this.state.pagesFetched,
      entries: entries.length,
      referencesSkipped: references,
      cookieLength: cookie.length,
      resultCount,
      moreAvailable: this.state.moreAvailable,
    });
  }

  private discardResults(): void {
    this.results?.invalidate();
    this.results = null;
  }

  private discardQuery(): void {
    this.discardResults();
    this.request = null;
    this.state = initialPageState();
    this.currentPhase = SearchPhase.Idle;
  }
}

export default PagedSearchEngine;
