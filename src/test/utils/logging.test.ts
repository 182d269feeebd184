import { describe, it, expect, vi } from "vitest";
import { withRequestLogging } from "../../utils/logging.js";

function lastEntry(sink: ReturnType<typeof vi.fn>): Record<string, unknown> {
  const line = sink.mock.calls.at(-1)?.[0];
  return typeof line === "string" ? JSON.parse(line) : {};
}

describe("withRequestLogging", () => {
  it("returns the wrapped function unchanged without a sink", () => {
    const fn = async () => "ok";
    expect(withRequestLogging("api", "list.do", null, fn)).toBe(fn);
  });

  it("logs successful calls", async () => {
    const sink = vi.fn();
    const wrapped = withRequestLogging("www.cha.go.kr", "list.do", sink, async () => "body");

    await expect(wrapped()).resolves.toBe("body");
    expect(sink).toHaveBeenCalledTimes(1);
    expect(lastEntry(sink)).toMatchObject({ api: "www.cha.go.kr", endpoint: "list.do", ok: true });
    expect(lastEntry(sink).ms).toEqual(expect.any(Number));
  });

  it("logs failures with status and rethrows the original error", async () => {
    const sink = vi.fn();
    const failure = Object.assign(new Error("boom"), { status: 503 });
    const wrapped = withRequestLogging(
      "www.cha.go.kr",
      "list.do",
      sink,
      async () => {
        throw failure;
      },
      (err) => (err === failure ? 503 : undefined)
    );

    await expect(wrapped()).rejects.toBe(failure);
    expect(lastEntry(sink)).toMatchObject({
      api: "www.cha.go.kr",
      endpoint: "list.do",
      ok: false,
      status: 503,
      error: "boom",
    });
  });
});
