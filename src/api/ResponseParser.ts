import { MalformedResponseError } from "../errors.js";
import {
  SearchResultPage,
  ImageSet,
  VideoSet,
  type SearchResultItem,
  type Detail,
  type Image,
  type HeritageEvent,
  type PalaceSearchResultItem,
  type PalaceDetail,
} from "../types.js";
import { RecordList } from "../utils/records.js";
import { parseKstDate } from "../utils/dates.js";
import { XmlElement } from "../utils/xml.js";

// ─── Constants ───────────────────────────────────────────────────

/** Returned by the video endpoint in place of a real file when an item has no video. */
export const EMPTY_VIDEO_URL = "http://116.67.83.213/webdata/file_data/media_data/videos/";

// ─── Parser ──────────────────────────────────────────────────────
//
// List rows, images, video entries, events and palace list rows are
// strict: a missing tag is a MalformedResponseError. Detail records,
// image-set metadata and palace details are lenient: missing or empty
// tags become null. The split follows what each endpoint reliably sends.

export class ResponseParser {
  // ── Heritage search ────────────────────────────────────────

  static parseSearchPage(xml: string): SearchResultPage {
    const root = XmlElement.parse(xml);
    const items = root.all("item").map(ResponseParser.parseSearchItem);
    const hits = ResponseParser.requireInt(root, "totalCnt");
    const pageUnit = ResponseParser.requireInt(root, "pageUnit");
    if (pageUnit === 0) throw MalformedResponseError.badValue("pageUnit", "0", "a positive integer");
    return new SearchResultPage(hits, pageUnit, ResponseParser.requireInt(root, "pageIndex"), items);
  }

  static parseSearchItem(item: XmlElement): SearchResultItem {
    return Object.freeze({
      sn: ResponseParser.requireInt(item, "sn"),
      uid: item.requireText("no"),
      typeName: item.requireText("ccmaName"),
      typeCode: item.requireText("ccbaKdcd"),
      managementNumber: item.requireText("ccbaAsno"),
      cityCode: item.requireText("ccbaCtcd"),
      linkageNumber: item.requireText("ccbaCpno"),
      name: item.requireText("ccbaMnm1"),
      nameHanja: item.requireText("ccbaMnm2"),
      city: item.requireText("ccbaCtcdNm"),
      district: item.requireText("ccsiName"),
      administrator: item.requireText("ccbaAdmin"),
      longitude: item.requireText("longitude"),
      latitude: item.requireText("latitude"),
      canceled: ResponseParser.requireFlag(item, "ccbaCncl"),
      lastModified: ResponseParser.requireDate(item, "regDt"),
    });
  }

  // ── Heritage detail ────────────────────────────────────────

  /**
   * Merge a detail response with the search row it was requested for.
   * Identity fields always come from the preview, whatever the response
   * says for the same tags.
   */
  static parseDetail(xml: string, preview: SearchResultItem): Detail {
    const root = XmlElement.parse(xml);
    // Descriptive tags sit under <item>; identifiers and coordinates at the root
    const item = root.first("item") ?? root;
    const pick = (tag: string): string | null =>
      ResponseParser.optionalText(item, tag) ?? ResponseParser.optionalText(root, tag);
    const pickDate = (tag: string): Date | null =>
      ResponseParser.toDate(tag, pick(tag));

    return Object.freeze({
      uid: preview.uid,
      typeCode: preview.typeCode,
      managementNumber: preview.managementNumber,
      cityCode: preview.cityCode,
      name: preview.name,
      nameHanja: preview.nameHanja,
      city: preview.city,
      district: preview.district,
      canceled: preview.canceled,
      lastModified: preview.lastModified,

      typeName: pick("ccmaName"),
      linkageNumber: pick("ccbaCpno"),
      longitude: pick("longitude"),
      latitude: pick("latitude"),
      categoryTop: pick("gcodeName"),
      categoryMajor: pick("bcodeName"),
      categoryMiddle: pick("mcodeName"),
      categoryMinor: pick("scodeName"),
      quantity: pick("ccbaQuan"),
      registeredAt: pickDate("ccbaAsdt"),
      canceledAt: pickDate("ccbaCndt"),
      location: pick("ccbaLcad"),
      era: pick("ccceName"),
      owner: pick("ccbaPoss"),
      administrator: pick("ccbaAdmin"),
      thumbnailUrl: pick("imageUrl"),
      content: pick("content"),
    });
  }

  // ── Media ──────────────────────────────────────────────────

  /**
   * Images arrive as parallel runs of <imageNuri>, <imageUrl> and
   * <ccimDesc> inside each <item>; the nth of each belong together.
   */
  static parseImages(xml: string): ImageSet {
    const root = XmlElement.parse(xml);
    const images: Image[] = [];

    for (const item of root.all("item")) {
      const licenses = item.all("imageNuri");
      const urls = item.all("imageUrl");
      const descriptions = item.all("ccimDesc");

      const count = Math.max(licenses.length, urls.length, descriptions.length);
      for (let i = 0; i < count; i++) {
        const license = licenses[i];
        const url = urls[i];
        const description = descriptions[i];
        if (!license) throw MalformedResponseError.missingTag("imageNuri", item.tag);
        if (!url) throw MalformedResponseError.missingTag("imageUrl", item.tag);
        if (!description) throw MalformedResponseError.missingTag("ccimDesc", item.tag);
        images.push(Object.freeze({
          license: license.text(),
          url: url.text(),
          description: description.text(),
        }));
      }
    }

    return new ImageSet(
      ResponseParser.optionalText(root, "ccbaMnm1"),
      ResponseParser.optionalText(root, "ccbaMnm2"),
      images
    );
  }

  static parseVideos(xml: string): VideoSet {
    const root = XmlElement.parse(xml);
    const urls: string[] = [];

    for (const item of root.all("item")) {
      const entries = item.all("videoUrl");
      if (entries.length === 0) throw MalformedResponseError.missingTag("videoUrl", item.tag);
      for (const entry of entries) {
        const url = entry.text();
        if (url !== "" && url !== EMPTY_VIDEO_URL) urls.push(url);
      }
    }

    return new VideoSet(urls);
  }

  // ── Events ─────────────────────────────────────────────────

  static parseEvents(xml: string): RecordList<HeritageEvent> {
    const root = XmlElement.parse(xml);
    return new RecordList(root.all("item").map(ResponseParser.parseEvent));
  }

  static parseEvent(item: XmlElement): HeritageEvent {
    return Object.freeze({
      id: item.requireText("seqNo"),
      siteCode: item.requireText("siteCode"),
      title: item.requireText("subTitle"),
      content: item.requireText("subContent"),
      startDate: ResponseParser.requireDate(item, "sDate"),
      endDate: ResponseParser.requireDate(item, "eDate"),
      host: item.requireText("groupName"),
      contact: item.requireText("contact"),
      location: item.requireText("subDesc"),
      url: item.requireText("subPath"),
      province: item.requireText("sido"),
      district: item.requireText("gugun"),
    });
  }

  // ── Palaces ────────────────────────────────────────────────

  static parsePalaceList(xml: string): RecordList<PalaceSearchResultItem> {
    const root = XmlElement.parse(xml);
    return new RecordList(root.all("list").map(ResponseParser.parsePalaceItem));
  }

  static parsePalaceItem(list: XmlElement): PalaceSearchResultItem {
    return Object.freeze({
      serialNumber: list.requireText("serial_number"),
      detailCode: list.requireText("detail_code"),
      palaceCode: list.requireText("gung_number"),
      name: list.requireText("contents_kor"),
      nameEnglish: list.requireText("contents_eng"),
      thumbnailUrl: list.requireText("imgUrl"),
    });
  }

  static parsePalaceDetail(xml: string, preview: PalaceSearchResultItem): PalaceDetail {
    const root = XmlElement.parse(xml);
    const item = root.first("item") ?? root;
    const pick = (tag: string): string | null => ResponseParser.optionalText(item, tag);

    return Object.freeze({
      serialNumber: preview.serialNumber,
      detailCode: preview.detailCode,
      palaceCode: preview.palaceCode,
      name: preview.name,
      nameEnglish: preview.nameEnglish,

      nameJapanese: pick("contents_jpn"),
      nameChinese: pick("contents_chi"),
      explanationKorean: pick("explanation_kor"),
      explanationEnglish: pick("explanation_eng"),
      explanationJapanese: pick("explanation_jpn"),
      explanationChinese: pick("explanation_chi"),
      imageUrls: Object.freeze(
        item.descendants("imgUrl").map((img) => img.text()).filter((url) => url !== "")
      ),
    });
  }

  // ── Value helpers ──────────────────────────────────────────

  /** Text of an optional tag; absent and empty both read as null. */
  private static optionalText(element: XmlElement, tag: string): string | null {
    const text = element.childText(tag);
    return text === null || text === "" ? null : text;
  }

  private static requireInt(element: XmlElement, tag: string): number {
    const text = element.requireText(tag);
    if (!/^\d+$/.test(text)) throw MalformedResponseError.badValue(tag, text, "an integer");
    return parseInt(text, 10);
  }

  private static requireFlag(element: XmlElement, tag: string): boolean {
    const text = element.requireText(tag);
    if (text === "Y") return true;
    if (text === "N") return false;
    throw MalformedResponseError.badValue(tag, text, "Y or N");
  }

  private static requireDate(element: XmlElement, tag: string): Date {
    const date = ResponseParser.toDate(tag, element.requireText(tag));
    if (!date) throw MalformedResponseError.badValue(tag, "", "a date");
    return date;
  }

  /** null stays null; present text must be a valid date. */
  private static toDate(tag: string, text: string | null): Date | null {
    if (text === null || text === "") return null;
    const date = parseKstDate(text);
    if (!date) throw MalformedResponseError.badValue(tag, text, "YYYYMMDD or YYYY-MM-DD HH:MM:SS");
    return date;
  }
}
