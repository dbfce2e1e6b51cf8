// Prometheus Metrics Service
// Counts client-side directory operations and renders them in Prometheus text format

export interface MetricsSnapshot {
  // Connection metrics
  connectionsTotal: number;
  connectionsCurrent: number;

  // Bind metrics
  bindRequestsTotal: number;
  bindSuccessTotal: number;

  // Search metrics
  searchQueriesTotal: number;
  searchPagesTotal: number;
  searchEntriesTotal: number;
  searchReferencesTotal: number;
  lastPageEntries: number;

  // Error metrics
  errors: Record<string, number>; // keyed by operation
}

export interface MetricsCollector {
  // Connection events
  recordConnection(): void;
  recordDisconnection(): void;

  // Bind events
  recordBind(success: boolean): void;

  // Search events
  recordSearchQuery(): void;
  recordSearchPage(entriesReturned: number, referencesSkipped: number): void;

  // Error events
  recordError(operation: string): void;
}

export class PrometheusMetricsService implements MetricsCollector {
  private connectionsTotal = 0;
  private connectionsCurrent = 0;

  private bindRequestsTotal = 0;
  private bindSuccessTotal = 0;

  private searchQueriesTotal = 0;
  private searchPagesTotal = 0;
  private searchEntriesTotal = 0;
  private searchReferencesTotal = 0;
  private lastPageEntries = 0;

  private errors: Record<string, number> = {};

  constructor(private readonly prefix = "ldapreader") {}

  // MetricsCollector implementation
  recordConnection(): void {
    this.connectionsTotal++;
    this.connectionsCurrent++;
  }

  recordDisconnection(): void {
    this.connectionsCurrent = Math.max(0, this.connectionsCurrent - 1);
  }

  recordBind(success: boolean): void {
    this.bindRequestsTotal++;
    if (success) {
      this.bindSuccessTotal++;
    }
  }

  recordSearchQuery(): void {
    this.searchQueriesTotal++;
  }

  recordSearchPage(entriesReturned: number, referencesSkipped: number): void {
    this.searchPagesTotal++;
    this.searchEntriesTotal += entriesReturned;
    this.searchReferencesTotal += referencesSkipped;
    this.lastPageEntries = entriesReturned;
  }

  recordError(operation: string): void {
    this.errors[operation] = (this.errors[operation] || 0) + 1;
  }

  // Metrics exposure
  getSnapshot(): MetricsSnapshot {
    return {
      connectionsTotal: this.connectionsTotal,
      connectionsCurrent: this.connectionsCurrent,
      bindRequestsTotal: this.bindRequestsTotal,
      bindSuccessTotal: this.bindSuccessTotal,
      searchQueriesTotal: this.searchQueriesTotal,
      searchPagesTotal: this.searchPagesTotal,
      searchEntriesTotal: this.searchEntriesTotal,
      searchReferencesTotal: this.searchReferencesTotal,
      lastPageEntries: this.lastPageEntries,
      errors: { ...this.errors },
    };
  }

  formatPrometheus(): string {
    const lines: string[] = [];
    const snapshot = this.getSnapshot();
    const metric = (name: string, type: "counter" | "gauge", help: string, value: number) => {
      lines.push(`# HELP ${this.prefix}_${name} ${help}`);
      lines.push(`# TYPE ${this.prefix}_${name} ${type}`);
      lines.push(`${this.prefix}_${name} ${value}`);
    };

    // Connection metrics
    metric("connections_total", "counter", "Total number of directory connections opened", snapshot.connectionsTotal);
    metric("connections_current", "gauge", "Current number of open directory connections", snapshot.connectionsCurrent);

    // Bind metrics
    metric("bind_requests_total", "counter", "Total number of bind requests sent", snapshot.bindRequestsTotal);
    metric("bind_success_total", "counter", "Total number of successful bind requests", snapshot.bindSuccessTotal);

    // Search metrics
    metric("search_queries_total", "counter", "Total number of paged searches started", snapshot.searchQueriesTotal);
    metric("search_pages_total", "counter", "Total number of result pages received", snapshot.searchPagesTotal);
    metric("search_entries_total", "counter", "Total number of entries received", snapshot.searchEntriesTotal);
    metric(
      "search_references_total",
      "counter",
      "Total number of search references skipped",
      snapshot.searchReferencesTotal,
    );
    metric("search_last_page_entries", "gauge", "Number of entries in the most recent page", snapshot.lastPageEntries);

    // Error metrics
    const errorEntries = Object.entries(snapshot.errors);
    if (errorEntries.length > 0) {
      lines.push(`# HELP ${this.prefix}_errors_total Total number of failed operations`);
      lines.push(`# TYPE ${this.prefix}_errors_total counter`);
      for (const [operation, errorCount] of errorEntries) {
        lines.push(`${this.prefix}_errors_total{operation="${operation}"} ${errorCount}`);
      }
    }

    return lines.join("\n") + "\n";
  }
}

export default PrometheusMetricsService;
