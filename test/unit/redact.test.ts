import { describe, it, expect } from "vitest";
import { createRedactor, REDACTED } from "../../src/advisor/redact.js";

describe("createRedactor", () => {
  it("replaces configured secrets", () => {
    const redact = createRedactor(["test-secret", undefined]);
    expect(redact("key=test-secret here")).toBe("key=[REDACTED] here");
    expect(redact("using test-secret twice: test-secret")).toBe(`using ${REDACTED} twice: ${REDACTED}`);
  });

  it("ignores secrets that are too short to be meaningful", () => {
    expect(createRedactor(["abc"])("abc abc")).toBe("abc abc");
  });

  it("replaces the longest secret first", () => {
    const redact = createRedactor(["test-secret", "test-secret-extended"]);
    expect(redact("test-secret-extended")).toBe(REDACTED);
  });

  it("treats secrets as literal text", () => {
    const redact = createRedactor(["https://hooks.example.test/a?b=1"]);
    expect(redact("posting to https://hooks.example.test/a?b=1 now")).toBe("posting to [REDACTED] now");
  });

  it("masks credential-shaped text", () => {
    const redact = createRedactor([]);
    expect(redact("use sk-testplaceholder123 for it")).toBe("use [REDACTED] for it");
    expect(redact("Authorization: Bearer abc.def-ghi")).toBe("Authorization: Bearer [REDACTED]");
    expect(redact("password: hunter22, next")).toBe("password: [REDACTED], next");
    expect(redact("API_KEY=placeholder")).toBe("API_KEY=[REDACTED]");
  });

  it("leaves ordinary text alone", () => {
    expect(createRedactor([])("Has jdoe been flagged before?")).toBe("Has jdoe been flagged before?");
  });
});
