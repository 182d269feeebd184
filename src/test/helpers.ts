import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { vi } from "vitest";
import type { HttpTransport } from "../api/HttpTransport.js";
import type { SearchResultItem } from "../types.js";

const FIXTURES_DIR = path.join(path.dirname(fileURLToPath(import.meta.url)), "fixtures");

export function loadFixture(name: string): string {
  return fs.readFileSync(path.join(FIXTURES_DIR, name), "utf-8");
}

/** Transport stub that answers every request with the given body. */
export function fakeTransport(body = "<result/>") {
  const getText = vi.fn<HttpTransport["getText"]>().mockResolvedValue(body);
  const transport: HttpTransport = { getText };
  return { transport, getText };
}

export function makeSearchItem(overrides: Partial<SearchResultItem> = {}): SearchResultItem {
  return {
    sn: 1,
    uid: "101",
    typeName: "국보",
    typeCode: "11",
    managementNumber: "00020000",
    cityCode: "11",
    linkageNumber: "1111100020000",
    name: "테스트 석탑",
    nameHanja: "測試 石塔",
    city: "서울",
    district: "종로구",
    administrator: "테스트 관리단체",
    longitude: "126.9882",
    latitude: "37.5711",
    canceled: false,
    lastModified: new Date("2023-11-07T06:21:01.000Z"),
    ...overrides,
  };
}
