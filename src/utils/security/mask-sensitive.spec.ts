import { describe, it, expect } from "vitest";
import { maskApiKey, maskSecrets } from "./mask-sensitive";

describe("maskApiKey", () => {
  it("reports missing keys", () => {
    expect(maskApiKey(undefined)).toBe("not set");
    expect(maskApiKey("")).toBe("not set");
  });

  it("keeps a short prefix", () => {
    // floor(20 * 0.15) = 3 visible characters
    expect(maskApiKey("test-secret-00000000")).toBe("tes" + "*".repeat(17));
  });
});

describe("maskSecrets", () => {
  it("masks apiKey fields at any depth", () => {
    const out = maskSecrets({
      llm: { providers: { openai: { model: "gpt-4", apiKey: "test-secret-00000000" } } },
      security: { apiKeyEnvPrefix: "SEA_" },
    });
    expect(out).toEqual({
      llm: { providers: { openai: { model: "gpt-4", apiKey: "tes" + "*".repeat(17) } } },
      security: { apiKeyEnvPrefix: "SEA_" },
    });
  });
});
