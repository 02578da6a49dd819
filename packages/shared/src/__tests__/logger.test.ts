import { describe, it, expect } from "vitest";
import pino from "pino";
import { loggerOptions } from "../logger/index.js";

function capture() {
  const lines: string[] = [];
  const log = pino({ ...loggerOptions, level: "info" }, {
    write: (line: string) => {
      lines.push(line);
    },
  });
  return { log, lines };
}

describe("Logger", () => {
  it("should keep token addresses readable", () => {
    const { log, lines } = capture();

    log.info({ campaign: { id: 1, token: "0x0000000000000000000000000000000000000AbC" } }, "created");

    const entry: unknown = JSON.parse(lines[0] ?? "{}");
    expect(entry).toMatchObject({
      msg: "created",
      campaign: { id: 1, token: "0x0000000000000000000000000000000000000AbC" },
    });
  });

  it("should censor secrets", () => {
    const { log, lines } = capture();

    log.warn({ signer: { privateKey: "test-secret", apiKey: "test-key" } }, "signer loaded");

    const entry: unknown = JSON.parse(lines[0] ?? "{}");
    expect(entry).toMatchObject({
      signer: { privateKey: "[REDACTED]", apiKey: "[REDACTED]" },
    });
  });
});
