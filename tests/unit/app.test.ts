import { describe, expect, it } from "vitest";
import { parseArgs } from "../../src/app.js";

describe("parseArgs", () => {
  it("uses defaults without flags", () => {
    expect(parseArgs([])).toEqual({ host: "0.0.0.0", port: 8000 });
  });

  it("reads separated and inline flag values", () => {
    expect(parseArgs(["--port", "9100", "--host=127.0.0.1", "--env-file", ".env.local"])).toEqual({
      host: "127.0.0.1",
      port: 9100,
      envFile: ".env.local",
    });
  });

  it("ignores a flag whose value is missing", () => {
    expect(parseArgs(["--host", "--port=9100"])).toEqual({ host: "0.0.0.0", port: 9100 });
  });

  it("rejects an invalid port", () => {
    expect(() => parseArgs(["--port", "http"])).toThrow("--port must be a TCP port. Received: http");
  });
});
