import { RecordKind, RecordList } from "./utils/records.js";

// ─── Query parameters ───────────────────────────────────────────────

export type QueryValue = string | number;

/** Wire field name → value, in insertion order. Only set fields appear. */
export type QueryParameters = Readonly<Record<string, QueryValue>>;

// ─── Heritage search ────────────────────────────────────────────────

/** One row of a heritage list search. Every field is required in the response. */
export type SearchResultItem = {
  readonly sn: number;
  readonly uid: string;
  readonly typeName: string;
  readonly typeCode: string;
  readonly managementNumber: string;
  readonly cityCode: string;
  readonly linkageNumber: string;
  readonly name: string;
  readonly nameHanja: string;
  readonly city: string;
  readonly district: string;
  readonly administrator: string;
  readonly longitude: string;
  readonly latitude: string;
  readonly canceled: boolean;
  readonly lastModified: Date;
};

export const SearchResultItemKind = new RecordKind<SearchResultItem>("SearchResultItem", [
  ["sn", "Sequence"],
  ["uid", "Unique ID"],
  ["typeName", "Heritage Type"],
  ["typeCode", "Heritage Type Code"],
  ["managementNumber", "Management Number"],
  ["cityCode", "Province Code"],
  ["linkageNumber", "Linkage Number"],
  ["name", "Name"],
  ["nameHanja", "Name (Hanja)"],
  ["city", "City"],
  ["district", "District"],
  ["administrator", "Administrator"],
  ["longitude", "Longitude"],
  ["latitude", "Latitude"],
  ["canceled", "Canceled"],
  ["lastModified", "Last Modified"],
]);

export class SearchResultPage extends RecordList<SearchResultItem> {
  constructor(
    readonly hits: number,
    readonly limit: number,
    readonly pageIndex: number,
    items: readonly SearchResultItem[]
  ) {
    super(items);
  }

  /**
   * Page count as the upstream paginator reports it: `hits / limit + 1`
   * with integer division, so an exact multiple yields one trailing empty
   * page. The parser never builds a page with a zero page size; a page
   * constructed directly with one has no pages, so this returns 0 rather
   * than dividing by zero.
   */
  pages(): number {
    if (this.limit <= 0) return 0;
    return Math.floor(this.hits / this.limit) + 1;
  }

  toString(): string {
    const header = `SearchResultPage: ${this.hits} hits, page ${this.pageIndex}/${this.pages()} (${this.limit} per page)`;
    return [header, ...this.map((item) => SearchResultItemKind.format(item))].join("\n");
  }
}

// ─── Heritage detail ────────────────────────────────────────────────

/**
 * Full record of one heritage item. Identity fields are carried over
 * from the SearchResultItem it was requested from; everything else is
 * optional in the detail response and null when missing.
 */
export type Detail = {
  readonly uid: string;
  readonly typeCode: string;
  readonly managementNumber: string;
  readonly cityCode: string;
  readonly name: string;
  readonly nameHanja: string;
  readonly city: string;
  readonly district: string;
  readonly canceled: boolean;
  readonly lastModified: Date;

  readonly typeName: string | null;
  readonly linkageNumber: string | null;
  readonly longitude: string | null;
  readonly latitude: string | null;
  readonly categoryTop: string | null;
  readonly categoryMajor: string | null;
  readonly categoryMiddle: string | null;
  readonly categoryMinor: string | null;
  readonly quantity: string | null;
  readonly registeredAt: Date | null;
  readonly canceledAt: Date | null;
  readonly location: string | null;
  readonly era: string | null;
  readonly owner: string | null;
  readonly administrator: string | null;
  readonly thumbnailUrl: string | null;
  readonly content: string | null;
};

export const DetailKind = new RecordKind<Detail>("Detail", [
  ["uid", "Unique ID"],
  ["typeCode", "Heritage Type Code"],
  ["managementNumber", "Management Number"],
  ["cityCode", "Province Code"],
  ["name", "Name"],
  ["nameHanja", "Name (Hanja)"],
  ["city", "City"],
  ["district", "District"],
  ["canceled", "Canceled"],
  ["lastModified", "Last Modified"],
  ["typeName", "Heritage Type"],
  ["linkageNumber", "Linkage Number"],
  ["longitude", "Longitude"],
  ["latitude", "Latitude"],
  ["categoryTop", "Category"],
  ["categoryMajor", "Category (Major)"],
  ["categoryMiddle", "Category (Middle)"],
  ["categoryMinor", "Category (Minor)"],
  ["quantity", "Quantity"],
  ["registeredAt", "Registered"],
  ["canceledAt", "Canceled On"],
  ["location", "Location"],
  ["era", "Era"],
  ["owner", "Owner"],
  ["administrator", "Administrator"],
  ["thumbnailUrl", "Thumbnail"],
  ["content", "Content"],
]);

// ─── Media ──────────────────────────────────────────────────────────

export type Image = {
  /** Public-use license type (공공누리) of the image. */
  readonly license: string;
  readonly url: string;
  readonly description: string;
};

export const ImageKind = new RecordKind<Image>("Image", [
  ["license", "License"],
  ["url", "URL"],
  ["description", "Description"],
]);

export class ImageSet extends RecordList<Image> {
  constructor(
    readonly name: string | null,
    readonly nameHanja: string | null,
    images: readonly Image[]
  ) {
    super(images);
  }

  toString(): string {
    const header = `ImageSet: ${this.name ?? "-"} (${this.length} images)`;
    return [header, ...this.map((image) => ImageKind.format(image))].join("\n");
  }
}

export class VideoSet extends RecordList<string> {
  toString(): string {
    return [`VideoSet (${this.length} videos)`, ...this.map((url) => `  ${url}`)].join("\n");
  }
}

// ─── Events ─────────────────────────────────────────────────────────

export type HeritageEvent = {
  readonly id: string;
  readonly siteCode: string;
  readonly title: string;
  readonly content: string;
  readonly startDate: Date;
  readonly endDate: Date;
  readonly host: string;
  readonly contact: string;
  readonly location: string;
  readonly url: string;
  readonly province: string;
  readonly district: string;
};

export const HeritageEventKind = new RecordKind<HeritageEvent>("Event", [
  ["id", "Event ID"],
  ["siteCode", "Event Type Code"],
  ["title", "Title"],
  ["content", "Content"],
  ["startDate", "Starts"],
  ["endDate", "Ends"],
  ["host", "Host"],
  ["contact", "Contact"],
  ["location", "Location"],
  ["url", "URL"],
  ["province", "Province"],
  ["district", "District"],
]);

// ─── Palaces ────────────────────────────────────────────────────────

export type PalaceSearchResultItem = {
  readonly serialNumber: string;
  readonly detailCode: string;
  readonly palaceCode: string;
  readonly name: string;
  readonly nameEnglish: string;
  readonly thumbnailUrl: string;
};

export const PalaceSearchResultItemKind = new RecordKind<PalaceSearchResultItem>(
  "PalaceSearchResultItem",
  [
    ["serialNumber", "Serial Number"],
    ["detailCode", "Detail Code"],
    ["palaceCode", "Palace Code"],
    ["name", "Name"],
    ["nameEnglish", "Name (English)"],
    ["thumbnailUrl", "Thumbnail"],
  ]
);

export type PalaceDetail = {
  readonly serialNumber: string;
  readonly detailCode: string;
  readonly palaceCode: string;
  readonly name: string;
  readonly nameEnglish: string;

  readonly nameJapanese: string | null;
  readonly nameChinese: string | null;
  readonly explanationKorean: string | null;
  readonly explanationEnglish: string | null;
  readonly explanationJapanese: string | null;
  readonly explanationChinese: string | null;
  readonly imageUrls: readonly string[];
};

export const PalaceDetailKind = new RecordKind<PalaceDetail>("PalaceDetail", [
  ["serialNumber", "Serial Number"],
  ["detailCode", "Detail Code"],
  ["palaceCode", "Palace Code"],
  ["name", "Name"],
  ["nameEnglish", "Name (English)"],
  ["nameJapanese", "Name (Japanese)"],
  ["nameChinese", "Name (Chinese)"],
  ["explanationKorean", "Explanation"],
  ["explanationEnglish", "Explanation (English)"],
  ["explanationJapanese", "Explanation (Japanese)"],
  ["explanationChinese", "Explanation (Chinese)"],
  ["imageUrls", "Images"],
]);
