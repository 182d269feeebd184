import { describe, it, expect, vi } from "vitest";
import {
  AxiosError,
  AxiosHeaders,
  type AxiosAdapter,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
} from "axios";
import { AxiosTransport, buildUrl } from "../../api/HttpTransport.js";
import { TransportError } from "../../errors.js";

const BASE = "http://www.cha.go.kr/cha/";
const URL_WITH_PARAMS = `${BASE}SearchKindOpenapiList.do?pageUnit=10&ccbaKdcd=11`;

function reply(config: InternalAxiosRequestConfig, status: number, data: string): AxiosResponse<string> {
  return { data, status, statusText: String(status), headers: new AxiosHeaders(), config };
}

/** Adapter answering in-process with a fixed status and body. */
function answering(status: number, data = "<result/>") {
  return vi.fn<AxiosAdapter>(async (config) => {
    const response = reply(config, status, data);
    if (status >= 200 && status < 300) return response;
    throw new AxiosError(
      `Request failed with status code ${status}`,
      AxiosError.ERR_BAD_RESPONSE,
      config,
      null,
      response
    );
  });
}

describe("buildUrl", () => {
  it("joins path and parameters in insertion order", () => {
    expect(buildUrl(BASE, "SearchKindOpenapiList.do", { pageUnit: 10, ccbaKdcd: "11" })).toBe(
      URL_WITH_PARAMS
    );
  });

  it("leaves out the query string when there are no parameters", () => {
    expect(buildUrl(BASE, "SearchKindOpenapiList.do", {})).toBe(`${BASE}SearchKindOpenapiList.do`);
  });

  it("joins beneath a base URL that lacks a trailing slash", () => {
    expect(buildUrl("http://localhost:8080/cha", "SearchKindOpenapiList.do", {})).toBe(
      "http://localhost:8080/cha/SearchKindOpenapiList.do"
    );
  });

  it("percent-encodes non-ASCII values", () => {
    expect(buildUrl(BASE, "SearchKindOpenapiList.do", { ccbaMnm1: "탑" })).toBe(
      `${BASE}SearchKindOpenapiList.do?ccbaMnm1=%ED%83%91`
    );
  });
});

describe("AxiosTransport", () => {
  it("returns the body of a successful response", async () => {
    const adapter = answering(200, "<result><totalCnt>0</totalCnt></result>");
    const transport = new AxiosTransport({ adapter, timeoutMs: 2500 });

    const body = await transport.getText(BASE, "SearchKindOpenapiList.do", { pageUnit: 10 });

    expect(body).toBe("<result><totalCnt>0</totalCnt></result>");
    const config = adapter.mock.calls[0][0];
    expect(config.baseURL).toBe(BASE);
    expect(config.url).toBe("SearchKindOpenapiList.do");
    expect(config.params).toEqual({ pageUnit: 10 });
    expect(config.timeout).toBe(2500);
    transport.close();
  });

  it("maps a non-2xx status to TransportError with the status", async () => {
    const transport = new AxiosTransport({ adapter: answering(503) });

    const failure = await transport
      .getText(BASE, "SearchKindOpenapiList.do", { pageUnit: 10, ccbaKdcd: "11" })
      .catch((err: unknown) => err);

    expect(failure).toBeInstanceOf(TransportError);
    expect(failure).toMatchObject({
      message: `GET ${URL_WITH_PARAMS} failed with status 503`,
      url: URL_WITH_PARAMS,
      status: 503,
    });
    expect(failure instanceof Error && failure.cause).toBeInstanceOf(AxiosError);
    transport.close();
  });

  it("reports a network failure with no status", async () => {
    const adapter = vi.fn<AxiosAdapter>(async (config) => {
      throw new AxiosError("connect ECONNREFUSED", "ECONNREFUSED", config);
    });
    const transport = new AxiosTransport({ adapter });

    await expect(transport.getText(BASE, "SearchKindOpenapiList.do", {})).rejects.toMatchObject({
      name: "TransportError",
      message: `GET ${BASE}SearchKindOpenapiList.do failed: connect ECONNREFUSED`,
      status: null,
    });
    transport.close();
  });

  it("logs one JSON line per request to the given sink", async () => {
    const log = vi.fn();
    const transport = new AxiosTransport({ adapter: answering(500), log });

    await expect(transport.getText(BASE, "SearchKindOpenapiDt.do", {})).rejects.toBeInstanceOf(
      TransportError
    );

    expect(log).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(log.mock.calls[0][0]))).toMatchObject({
      api: "www.cha.go.kr",
      endpoint: "SearchKindOpenapiDt.do",
      ok: false,
      status: 500,
      error: `GET ${BASE}SearchKindOpenapiDt.do failed with status 500`,
    });
    transport.close();
  });

  it("refuses requests after close", async () => {
    const adapter = answering(200);
    const transport = new AxiosTransport({ adapter });

    transport.close();

    await expect(transport.getText(BASE, "SearchKindOpenapiList.do", {})).rejects.toThrow(
      "Transport has been closed"
    );
    expect(adapter).not.toHaveBeenCalled();
  });
});
