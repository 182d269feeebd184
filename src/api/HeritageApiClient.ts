import type { PalaceSearchResultItem, SearchResultItem } from "../types.js";
import type { Palace } from "../codes.js";
import { resolveConfig, type ClientConfig } from "../utils/config.js";
import { AxiosTransport, type HttpTransport } from "./HttpTransport.js";
import {
  EventSearch,
  HeritageItemQuery,
  HeritageSearch,
  type EventSearchFilters,
  type HeritageSearchFilters,
} from "./HeritageSearch.js";
import { PalaceItemQuery, PalaceSearch } from "./PalaceSearch.js";

export interface ApiClientOptions {
  /** Use this transport instead of creating one. The caller keeps ownership. */
  transport?: HttpTransport;
  /** Overrides for settings otherwise read from the environment. */
  config?: Partial<ClientConfig>;
}

/**
 * Base for the two API roots. Owns the transport it creates and closes
 * it in `close()`; a transport passed in is left to its owner.
 */
abstract class ApiClientBase {
  protected readonly transport: HttpTransport;
  protected readonly config: ClientConfig;
  private readonly ownedTransport: AxiosTransport | null;

  constructor(options: ApiClientOptions = {}) {
    this.config = resolveConfig(options.config);
    if (options.transport) {
      this.transport = options.transport;
      this.ownedTransport = null;
    } else {
      this.ownedTransport = new AxiosTransport({
        timeoutMs: this.config.timeoutMs,
        log: this.config.logRequests,
      });
      this.transport = this.ownedTransport;
    }
  }

  close(): void {
    this.ownedTransport?.close();
  }
}

// ─── General heritage API ──────────────────────────────────────────

export class HeritageApiClient extends ApiClientBase {
  search(filters: HeritageSearchFilters = {}): HeritageSearch {
    return new HeritageSearch(this.transport, filters, this.config.heritageApiUrl);
  }

  /** Detail, image and video lookups for a search result. */
  item(preview: SearchResultItem): HeritageItemQuery {
    return new HeritageItemQuery(this.transport, preview, this.config.heritageApiUrl);
  }

  events(filters: EventSearchFilters): EventSearch {
    return new EventSearch(this.transport, filters, this.config.heritageApiUrl);
  }
}

// ─── Palace API ────────────────────────────────────────────────────

export class PalaceApiClient extends ApiClientBase {
  search(palace: Palace): PalaceSearch {
    return new PalaceSearch(this.transport, palace, this.config.palaceApiUrl);
  }

  item(preview: PalaceSearchResultItem): PalaceItemQuery {
    return new PalaceItemQuery(this.transport, preview, this.config.palaceApiUrl);
  }
}
