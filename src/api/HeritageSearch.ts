import type { District, EventTypeCode, HeritageTypeCode, Province } from "../codes.js";
import type {
  Detail,
  HeritageEvent,
  ImageSet,
  SearchResultItem,
  SearchResultPage,
  VideoSet,
} from "../types.js";
import type { RecordList } from "../utils/records.js";
import { DEFAULT_HERITAGE_API_URL } from "../utils/config.js";
import type { HttpTransport } from "./HttpTransport.js";
import { QueryBuilder, yesNo } from "./QueryBuilder.js";
import { ResponseParser } from "./ResponseParser.js";

// ─── Heritage list search ───────────────────────────────────────────

export interface HeritageSearchFilters {
  heritageType?: HeritageTypeCode;
  /** Designation year range, inclusive. */
  startYear?: number;
  endYear?: number;
  /** Substring of the Korean name. */
  name?: string;
  province?: Province;
  /**
   * District within the province. Not checked against `province`; a
   * mismatched pair is sent as-is and the upstream decides the outcome.
   */
  district?: District;
  linkageNumber?: string;
  managementNumber?: string;
  canceled?: boolean;
  pageSize?: number;
  pageIndex?: number;
}

export class HeritageSearch extends QueryBuilder {
  static readonly ENDPOINT = "SearchKindOpenapiList.do";

  constructor(
    transport: HttpTransport,
    filters: HeritageSearchFilters = {},
    baseUrl: string = DEFAULT_HERITAGE_API_URL
  ) {
    super(transport, baseUrl);
    this.setStartYear(filters.startYear);
    this.setEndYear(filters.endYear);
    this.setName(filters.name);
    this.setLinkageNumber(filters.linkageNumber);
    this.setManagementNumber(filters.managementNumber);
    this.setPageSize(filters.pageSize);
    this.setPageIndex(filters.pageIndex);
    this.setCanceled(filters.canceled);
    this.setHeritageType(filters.heritageType);
    this.setProvince(filters.province);
    this.setDistrict(filters.district);
  }

  setStartYear(year: number | undefined): this {
    this.setParam("stCcbaAsdt", year);
    return this;
  }

  setEndYear(year: number | undefined): this {
    this.setParam("enCcbaAsdt", year);
    return this;
  }

  setName(name: string | undefined): this {
    this.setParam("ccbaMnm1", name);
    return this;
  }

  setLinkageNumber(linkageNumber: string | undefined): this {
    this.setParam("ccbaCpno", linkageNumber);
    return this;
  }

  setManagementNumber(managementNumber: string | undefined): this {
    this.setParam("ccbaAsno", managementNumber);
    return this;
  }

  setPageSize(pageSize: number | undefined): this {
    this.setParam("pageUnit", pageSize);
    return this;
  }

  setPageIndex(pageIndex: number | undefined): this {
    this.setParam("pageIndex", pageIndex);
    return this;
  }

  setCanceled(canceled: boolean | undefined): this {
    this.setParam("ccbaCncl", yesNo(canceled));
    return this;
  }

  setHeritageType(type: HeritageTypeCode | undefined): this {
    this.setParam("ccbaKdcd", type?.code);
    return this;
  }

  setProvince(province: Province | undefined): this {
    this.setParam("ccbaCtcd", province?.code);
    return this;
  }

  setDistrict(district: District | undefined): this {
    this.setParam("ccbaLcto", district?.code);
    return this;
  }

  url(): string {
    return this.urlFor(HeritageSearch.ENDPOINT);
  }

  async commit(): Promise<SearchResultPage> {
    const xml = await this.fetchXml(HeritageSearch.ENDPOINT);
    return ResponseParser.parseSearchPage(xml);
  }
}

// ─── Per-item sub-resources ─────────────────────────────────────────

/**
 * Detail, image and video lookups for one item from a search page. The
 * item is addressed by heritage type, management number and province.
 */
export class HeritageItemQuery extends QueryBuilder {
  static readonly DETAIL_ENDPOINT = "SearchKindOpenapiDt.do";
  static readonly IMAGE_ENDPOINT = "SearchImageOpenapi.do";
  static readonly VIDEO_ENDPOINT = "SearchVideoOpenapi.do";

  constructor(
    transport: HttpTransport,
    readonly preview: SearchResultItem,
    baseUrl: string = DEFAULT_HERITAGE_API_URL
  ) {
    super(transport, baseUrl);
    this.setParam("ccbaKdcd", preview.typeCode);
    this.setParam("ccbaAsno", preview.managementNumber);
    this.setParam("ccbaCtcd", preview.cityCode);
  }

  url(endpoint: string = HeritageItemQuery.DETAIL_ENDPOINT): string {
    return this.urlFor(endpoint);
  }

  async info(): Promise<Detail> {
    const xml = await this.fetchXml(HeritageItemQuery.DETAIL_ENDPOINT);
    return ResponseParser.parseDetail(xml, this.preview);
  }

  async images(): Promise<ImageSet> {
    const xml = await this.fetchXml(HeritageItemQuery.IMAGE_ENDPOINT);
    return ResponseParser.parseImages(xml);
  }

  async videos(): Promise<VideoSet> {
    const xml = await this.fetchXml(HeritageItemQuery.VIDEO_ENDPOINT);
    return ResponseParser.parseVideos(xml);
  }
}

// ─── Event calendar ─────────────────────────────────────────────────

export interface EventSearchFilters {
  year: number;
  /** 1–12. */
  month: number;
  searchWord?: string;
  eventType?: EventTypeCode;
}

export class EventSearch extends QueryBuilder {
  static readonly ENDPOINT = "openapi/selectEventListOpenapi.do";

  constructor(
    transport: HttpTransport,
    filters: EventSearchFilters,
    baseUrl: string = DEFAULT_HERITAGE_API_URL
  ) {
    super(transport, baseUrl);
    this.setYear(filters.year);
    this.setMonth(filters.month);
    this.setSearchWord(filters.searchWord);
    this.setEventType(filters.eventType);
  }

  setYear(year: number): this {
    this.setParam("searchYear", year);
    return this;
  }

  setMonth(month: number): this {
    this.setParam("searchMonth", month);
    return this;
  }

  setSearchWord(word: string | undefined): this {
    this.setParam("searchWrd", word);
    return this;
  }

  setEventType(type: EventTypeCode | undefined): this {
    this.setParam("siteCode", type?.code);
    return this;
  }

  url(): string {
    return this.urlFor(EventSearch.ENDPOINT);
  }

  async commit(): Promise<RecordList<HeritageEvent>> {
    const xml = await this.fetchXml(EventSearch.ENDPOINT);
    return ResponseParser.parseEvents(xml);
  }
}
