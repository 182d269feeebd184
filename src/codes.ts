import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { UnknownCodeError } from "./errors.js";

// ─── Code values ────────────────────────────────────────────────────
// Enumerated parameter codes published by the Cultural Heritage
// Administration. Values reflect the upstream documentation as of
// November 2023.

export interface CodeValue<S extends string = string> {
  /** The set this value belongs to, e.g. "HeritageType". */
  readonly set: S;
  readonly name: string;
  /** Wire code sent to the upstream service. */
  readonly code: string;
  /** Korean label. */
  readonly label: string;
}

type CodeTable<K extends string> = Record<K, readonly [code: string, label: string]>;

/**
 * A closed set of name → code pairs. Names and codes are each unique
 * within a set; lookups in either direction throw UnknownCodeError.
 */
export class CodeSet<S extends string, K extends string = string>
  implements Iterable<CodeValue<S>>
{
  private readonly byNameMap = new Map<string, CodeValue<S>>();
  private readonly byCodeMap = new Map<string, CodeValue<S>>();

  /**
   * @param scope Qualifies the set in error messages (district sets are
   *   scoped to a province).
   */
  constructor(
    readonly set: S,
    table: CodeTable<K>,
    readonly scope: string | null = null
  ) {
    for (const [name, [code, label]] of Object.entries<readonly [string, string]>(table)) {
      if (!code) throw new Error(`${this.description}: empty code for ${name}`);
      if (this.byCodeMap.has(code)) {
        throw new Error(`${this.description}: duplicate code "${code}" for ${name}`);
      }
      const value: CodeValue<S> = Object.freeze({ set, name, code, label });
      this.byNameMap.set(name, value);
      this.byCodeMap.set(code, value);
    }
  }

  /** Typed lookup for names known at compile time. */
  get(name: K): CodeValue<S> {
    return this.byName(name);
  }

  byName(name: string): CodeValue<S> {
    const value = this.byNameMap.get(name);
    if (!value) throw new UnknownCodeError(this.description, name);
    return value;
  }

  byCode(code: string): CodeValue<S> {
    const value = this.byCodeMap.get(code);
    if (!value) throw new UnknownCodeError(this.description, code);
    return value;
  }

  has(nameOrValue: string | CodeValue): boolean {
    if (typeof nameOrValue === "string") return this.byNameMap.has(nameOrValue);
    return this.byNameMap.get(nameOrValue.name) === nameOrValue;
  }

  values(): CodeValue<S>[] {
    return [...this.byNameMap.values()];
  }

  get size(): number {
    return this.byNameMap.size;
  }

  [Symbol.iterator](): Iterator<CodeValue<S>> {
    return this.byNameMap.values();
  }

  private get description(): string {
    return this.scope ? `${this.set}(${this.scope})` : this.set;
  }
}

// ─── Fixed sets ─────────────────────────────────────────────────────

export const HeritageType = new CodeSet("HeritageType", {
  NATIONAL_TREASURE: ["11", "국보"],
  TREASURE: ["12", "보물"],
  HISTORIC_SITE: ["13", "사적"],
  HISTORIC_AND_SCENIC_SITE: ["14", "사적및명승"],
  SCENIC_SITE: ["15", "명승"],
  NATURAL_MONUMENT: ["16", "천연기념물"],
  INTANGIBLE_HERITAGE: ["17", "국가무형문화재"],
  FOLKLORE_HERITAGE: ["18", "국가민속문화재"],
  REGIONAL_HERITAGE: ["21", "시도유형문화재"],
  REGIONAL_INTANGIBLE_HERITAGE: ["22", "시도무형문화재"],
  REGIONAL_MONUMENT: ["23", "시도기념물"],
  REGIONAL_FOLKLORE_HERITAGE: ["24", "시도민속문화재"],
  REGIONAL_REGISTERED_HERITAGE: ["25", "시도등록문화재"],
  HERITAGE_MATERIAL: ["31", "문화재자료"],
  NATIONAL_REGISTERED_HERITAGE: ["79", "국가등록문화재"],
  NORTH_KOREAN_INTANGIBLE_HERITAGE: ["80", "이북5도무형문화재"],
});

export const EventType = new CodeSet("EventType", {
  NIGHTTIME_HERITAGE: ["01", "문화재야행"],
  VIVID_HERITAGE: ["02", "생생문화재"],
  TRADITIONAL_TEMPLE_HERITAGE: ["03", "전통산사문화재"],
  HYANGGYO_AND_SEOWON: ["04", "살아숨쉬는향교서원"],
  OTHERS: ["06", "기타행사"],
  NATIONAL_INTANGIBLE_HERITAGE: ["07", "국립무형유산원"],
  CULTURAL_HERITAGE_FOUNDATION: ["08", "한국문화재재단"],
  TRADITIONAL_HOUSES: ["09", "고택종갓집"],
  WORLD_HERITAGE: ["10", "세계유산"],
});

export const ProvinceCode = new CodeSet("ProvinceCode", {
  SEOUL: ["11", "서울"],
  BUSAN: ["21", "부산"],
  DAEGU: ["22", "대구"],
  INCHEON: ["23", "인천"],
  GWANGJU: ["24", "광주"],
  DAEJEON: ["25", "대전"],
  ULSAN: ["26", "울산"],
  SEJONG: ["45", "세종"],
  GYEONGGI: ["31", "경기"],
  GANGWON: ["32", "강원"],
  CHUNGBUK: ["33", "충북"],
  CHUNGNAM: ["34", "충남"],
  JEONBUK: ["35", "전북"],
  JEONNAM: ["36", "전남"],
  GYEONGBUK: ["37", "경북"],
  GYEONGNAM: ["38", "경남"],
  JEJU: ["50", "제주"],
  NATIONAL: ["ZZ", "전국일원"],
});

// The palace service numbers its palaces with single digits.
export const PalaceCode = new CodeSet("PalaceCode", {
  GYEONGBOKGUNG: ["1", "경복궁"],
  CHANGDEOKGUNG: ["2", "창덕궁"],
  CHANGGYEONGGUNG: ["3", "창경궁"],
  DEOKSUGUNG: ["4", "덕수궁"],
  JONGMYO: ["5", "종묘"],
});

export type HeritageTypeCode = CodeValue<"HeritageType">;
export type EventTypeCode = CodeValue<"EventType">;
export type Province = CodeValue<"ProvinceCode">;
export type District = CodeValue<"District">;
export type Palace = CodeValue<"PalaceCode">;

// ─── District sets ──────────────────────────────────────────────────
// One table per province, keyed by province code. District codes repeat
// across provinces, so a district is only meaningful together with the
// province it was looked up under.

const DistrictFileSchema = z.record(
  z.string(),
  z.object({
    province: z.string(),
    districts: z.record(z.string(), z.tuple([z.string(), z.string()])),
  })
);

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const DISTRICTS_PATH = path.join(__dirname, "..", "data", "districts.json");

function loadDistrictSets(): Map<string, CodeSet<"District">> {
  const raw: unknown = JSON.parse(fs.readFileSync(DISTRICTS_PATH, "utf-8"));
  const file = DistrictFileSchema.parse(raw);

  const sets = new Map<string, CodeSet<"District">>();
  for (const [provinceCode, entry] of Object.entries(file)) {
    const province = ProvinceCode.byCode(provinceCode);
    if (province.name !== entry.province) {
      throw new Error(
        `districts.json: province ${provinceCode} is ${province.name}, file says ${entry.province}`
      );
    }
    sets.set(provinceCode, new CodeSet("District", entry.districts, province.name));
  }
  return sets;
}

const DISTRICT_SETS = loadDistrictSets();

/** The district set of a province, by CodeValue or province code. */
export function districtsOf(province: Province | string): CodeSet<"District"> {
  const code = typeof province === "string" ? province : province.code;
  const set = DISTRICT_SETS.get(code);
  if (!set) throw new UnknownCodeError("DistrictSets", code);
  return set;
}
