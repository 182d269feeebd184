export { HeritageApiClient, PalaceApiClient, type ApiClientOptions } from "./api/HeritageApiClient.js";
export {
  HeritageSearch,
  HeritageItemQuery,
  EventSearch,
  type HeritageSearchFilters,
  type EventSearchFilters,
} from "./api/HeritageSearch.js";
export { PalaceSearch, PalaceItemQuery } from "./api/PalaceSearch.js";
export { QueryBuilder } from "./api/QueryBuilder.js";
export { ResponseParser, EMPTY_VIDEO_URL } from "./api/ResponseParser.js";
export {
  AxiosTransport,
  buildUrl,
  type HttpTransport,
  type AxiosTransportOptions,
} from "./api/HttpTransport.js";

export {
  CodeSet,
  HeritageType,
  EventType,
  ProvinceCode,
  PalaceCode,
  districtsOf,
  type CodeValue,
  type HeritageTypeCode,
  type EventTypeCode,
  type Province,
  type District,
  type Palace,
} from "./codes.js";

export {
  SearchResultPage,
  ImageSet,
  VideoSet,
  SearchResultItemKind,
  DetailKind,
  ImageKind,
  HeritageEventKind,
  PalaceSearchResultItemKind,
  PalaceDetailKind,
  type QueryParameters,
  type QueryValue,
  type SearchResultItem,
  type Detail,
  type Image,
  type HeritageEvent,
  type PalaceSearchResultItem,
  type PalaceDetail,
} from "./types.js";

export {
  HeritageApiError,
  TransportError,
  MalformedResponseError,
  UnknownCodeError,
  ConfigurationError,
} from "./errors.js";

export { RecordKind, RecordList, type FieldList, type PlainValue } from "./utils/records.js";
export { loadConfig, resolveConfig, type ClientConfig } from "./utils/config.js";
export { parseKstDate, formatKstDate } from "./utils/dates.js";
export { XmlElement } from "./utils/xml.js";
export type { LogSink, RequestLogEntry } from "./utils/logging.js";
