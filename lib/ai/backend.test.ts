import { MockLanguageModelV2 } from "ai/test";
import { describe, expect, it } from "vitest";
import { createGatewayBackend, createLanguageModelBackend } from "./backend";
import type { LanguageModelSource } from "./providers";

function mockModel(text: string) {
  return new MockLanguageModelV2({
    doGenerate: async () => ({
      content: [{ type: "text", text }],
      finishReason: "stop",
      usage: { inputTokens: 12, outputTokens: 8, totalTokens: 20 },
      warnings: [],
    }),
  });
}

function recordingProvider(model: MockLanguageModelV2) {
  const requested: string[] = [];
  const provider: LanguageModelSource = {
    languageModel(modelId) {
      requested.push(modelId);
      return model;
    },
  };
  return { provider, requested };
}

describe("createLanguageModelBackend", () => {
  it("sends the persona as system, the scene as the user prompt, and the temperature", async () => {
    const model = mockModel("Torchlight flickers across the runes.");
    const backend = createLanguageModelBackend({ model, temperature: 0.3 });

    const text = await backend.generate({
      system: "You are a test narrator.",
      prompt: "Player action: read the runes",
    });

    expect(text).toBe("Torchlight flickers across the runes.");
    expect(model.doGenerateCalls).toHaveLength(1);
    expect(model.doGenerateCalls[0].temperature).toBe(0.3);
    expect(model.doGenerateCalls[0].prompt).toMatchObject([
      { role: "system", content: "You are a test narrator." },
      {
        role: "user",
        content: [{ type: "text", text: "Player action: read the runes" }],
      },
    ]);
  });

  it("defaults the temperature to 0.7", async () => {
    const model = mockModel("ok");
    await createLanguageModelBackend({ model }).generate({ system: "s", prompt: "p" });
    expect(model.doGenerateCalls[0].temperature).toBe(0.7);
  });
});

describe("createGatewayBackend", () => {
  it("resolves the configured model id through the provider", async () => {
    const model = mockModel("The gate groans.");
    const { provider, requested } = recordingProvider(model);
    const backend = createGatewayBackend({
      apiKey: "test-secret",
      model: "openai/gpt-4o-mini",
      temperature: 1.1,
      provider,
    });

    expect(await backend.generate({ system: "s", prompt: "p" })).toBe("The gate groans.");
    expect(requested).toEqual(["openai/gpt-4o-mini"]);
    expect(model.doGenerateCalls[0].temperature).toBe(1.1);
  });

  it("strips the thinking block from -thinking models", async () => {
    const model = mockModel("<thinking>the trap is armed</thinking>The gate opens.");
    const { provider, requested } = recordingProvider(model);
    const backend = createGatewayBackend({
      apiKey: "test-secret",
      model: "openai/o4-mini-thinking",
      provider,
    });

    expect(await backend.generate({ system: "s", prompt: "p" })).toBe("The gate opens.");
    expect(requested).toEqual(["openai/o4-mini"]);
  });

  it("leaves text alone for regular models", async () => {
    const model = mockModel("<thinking>kept</thinking>Text.");
    const { provider } = recordingProvider(model);
    const backend = createGatewayBackend({ apiKey: "test-secret", provider });

    expect(await backend.generate({ system: "s", prompt: "p" })).toBe(
      "<thinking>kept</thinking>Text."
    );
  });
});
