import type { QueryParameters, QueryValue } from "../types.js";
import { normalizeBaseUrl } from "../utils/config.js";
import { buildUrl, type HttpTransport } from "./HttpTransport.js";

/**
 * Shared shape of every request builder: a mutable parameter mapping
 * bound to one transport, base URL and endpoint. Builders are reusable;
 * each request sends the parameters as they are at call time.
 */
export abstract class QueryBuilder {
  private readonly values: Record<string, QueryValue> = {};
  protected readonly baseUrl: string;

  protected constructor(
    protected readonly transport: HttpTransport,
    baseUrl: string
  ) {
    this.baseUrl = normalizeBaseUrl(baseUrl);
  }

  /** Snapshot of the parameters that will be sent. */
  params(): QueryParameters {
    return { ...this.values };
  }

  /** Overwrite one wire field. Undefined removes it from the request. */
  protected setParam(key: string, value: QueryValue | undefined): void {
    if (value === undefined) delete this.values[key];
    else this.values[key] = value;
  }

  protected urlFor(endpoint: string): string {
    return buildUrl(this.baseUrl, endpoint, this.values);
  }

  protected fetchXml(endpoint: string): Promise<string> {
    return this.transport.getText(this.baseUrl, endpoint, this.params());
  }
}

/** Booleans go over the wire as Y/N. */
export function yesNo(flag: boolean | undefined): "Y" | "N" | undefined {
  if (flag === undefined) return undefined;
  return flag ? "Y" : "N";
}
