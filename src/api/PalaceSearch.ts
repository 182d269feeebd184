import type { Palace } from "../codes.js";
import type { PalaceDetail, PalaceSearchResultItem } from "../types.js";
import type { RecordList } from "../utils/records.js";
import { DEFAULT_PALACE_API_URL } from "../utils/config.js";
import type { HttpTransport } from "./HttpTransport.js";
import { QueryBuilder } from "./QueryBuilder.js";
import { ResponseParser } from "./ResponseParser.js";

/** Lists the buildings and sites of one palace. */
export class PalaceSearch extends QueryBuilder {
  static readonly ENDPOINT = "heri/gungDetail/gogungListOpenApi.do";

  constructor(
    transport: HttpTransport,
    palace: Palace,
    baseUrl: string = DEFAULT_PALACE_API_URL
  ) {
    super(transport, baseUrl);
    this.setPalace(palace);
  }

  setPalace(palace: Palace): this {
    this.setParam("gung_number", palace.code);
    return this;
  }

  url(): string {
    return this.urlFor(PalaceSearch.ENDPOINT);
  }

  async commit(): Promise<RecordList<PalaceSearchResultItem>> {
    const xml = await this.fetchXml(PalaceSearch.ENDPOINT);
    return ResponseParser.parsePalaceList(xml);
  }
}

/** Detail lookup for one row of a palace list. */
export class PalaceItemQuery extends QueryBuilder {
  static readonly ENDPOINT = "heri/gungDetail/gogungDetailOpenApi.do";

  constructor(
    transport: HttpTransport,
    readonly preview: PalaceSearchResultItem,
    baseUrl: string = DEFAULT_PALACE_API_URL
  ) {
    super(transport, baseUrl);
    this.setParam("serial_number", preview.serialNumber);
    this.setParam("gung_number", preview.palaceCode);
    this.setParam("detail_code", preview.detailCode);
  }

  url(): string {
    return this.urlFor(PalaceItemQuery.ENDPOINT);
  }

  async info(): Promise<PalaceDetail> {
    const xml = await this.fetchXml(PalaceItemQuery.ENDPOINT);
    return ResponseParser.parsePalaceDetail(xml, this.preview);
  }
}
