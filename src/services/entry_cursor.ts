// Entry Cursor
// Walks the entries of the current page and pulls the next page when one runs out

import { Entry, ResultSet } from "../models/entry.ts";
import { NoCurrentEntryError } from "../models/errors.ts";
import { PagedSearchEngine } from "./paged_search.ts";

export enum CursorState {
  NoResult = "no_result",
  PageReady = "page_ready",
  AtEntry = "at_entry",
  Exhausted = "exhausted",
}

export class EntryCursor {
  private page: ResultSet | null = null;
  private index = -1;
  private cursorState = CursorState.NoResult;

  constructor(private readonly engine: PagedSearchEngine) {}

  get state(): CursorState {
    this.sync();
    return this.cursorState;
  }

  /** Position of the current entry within its page, or -1. */
  get position(): number {
    this.sync();
    return this.cursorState === CursorState.AtEntry ? this.index : -1;
  }

  /**
   * Advance to the next entry. Resolves false once the query has no entries left; empty
   * pages in between are skipped.
   */
  async fetch(): Promise<boolean> {
    while (true) {
      this.sync();
      const page = this.page;
      if (!page || this.cursorState === CursorState.Exhausted) return false;

      if (this.index + 1 < page.size) {
        this.index++;
        this.cursorState = CursorState.AtEntry;
        return true;
      }

      if (!this.engine.moreAvailable) {
        this.cursorState = CursorState.Exhausted;
        return false;
      }

      try {
        await this.engine.fetchNextPage();
      } catch (err) {
        this.page = null;
        this.index = -1;
        this.cursorState = CursorState.NoResult;
        throw err;
      }
    }
  }

  get current(): Entry {
    this.sync();
    if (this.cursorState !== CursorState.AtEntry || !this.page) {
      throw new NoCurrentEntryError("No entry is positioned; call fetch() first");
    }
    return this.page.entries[this.index];
  }

  // Follow the engine to a new page or query, or back to nothing after a failure
  private sync(): void {
    const page = this.engine.resultSet;
    if (page === this.page) return;
    this.page = page;
    this.index = -1;
    this.cursorState = page ? CursorState.PageReady : CursorState.NoResult;
  }
}

export default EntryCursor;
