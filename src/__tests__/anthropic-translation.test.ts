import { describe, it, expect, vi, beforeEach } from "vitest";

const { create, constructed } = vi.hoisted(() => {
  const constructed: unknown[] = [];
  return { create: vi.fn(), constructed };
});

vi.mock("@anthropic-ai/sdk", () => {
  class APIError extends Error {
    readonly status: number | undefined;
    constructor(status: number | undefined, _error: unknown, message: string | undefined, _headers: unknown) {
      super(message);
      this.status = status;
    }
  }
  class APIConnectionError extends APIError {
    constructor({ message }: { message?: string }) {
      super(undefined, undefined, message ?? "Connection error.", undefined);
    }
  }
  class Anthropic {
    static APIError = APIError;
    static APIConnectionError = APIConnectionError;
    messages = { create };
    constructor(options: unknown) {
      constructed.push(options);
    }
  }
  return { default: Anthropic };
});

import Anthropic from "@anthropic-ai/sdk";
import { AnthropicTranslationService, createTranslationService } from "../lib/translation/anthropic";
import { TransientTranslationError } from "../lib/translation/types";

const OPTIONS = { sourceLanguage: "zh", targetLanguage: "ru" };

function toolReply(input: unknown) {
  return {
    content: [
      { type: "text", text: "Вот переводы." },
      { type: "tool_use", id: "toolu_test", name: "report_translations", input },
    ],
  };
}

describe("AnthropicTranslationService", () => {
  beforeEach(() => {
    create.mockReset();
    constructed.length = 0;
  });

  it("returns positional results and marks null items as failures", async () => {
    create.mockResolvedValue(toolReply({ translations: [" белый ", null, "седан"] }));
    const service = new AnthropicTranslationService({ apiKey: "test-secret", model: "test-model" });

    const results = await service.translate(["白色", "某某", "三厢车"], OPTIONS);

    expect(results).toEqual([
      { ok: true, text: "белый" },
      { ok: false, reason: "No translation returned" },
      { ok: true, text: "седан" },
    ]);
  });

  it("forces the report tool, lists the texts and passes the abort signal", async () => {
    create.mockResolvedValue(toolReply({ translations: ["белый"] }));
    const service = new AnthropicTranslationService({ apiKey: "test-secret", model: "test-model" });
    const controller = new AbortController();

    await service.translate(["白色"], { ...OPTIONS, signal: controller.signal });

    const [body, requestOptions] = create.mock.calls[0];
    expect(body.model).toBe("test-model");
    expect(body.tool_choice).toEqual({ type: "tool", name: "report_translations" });
    expect(body.messages[0].content).toContain('["白色"]');
    expect(body.messages[0].content).toContain("from Chinese to Russian");
    expect(requestOptions).toEqual({ signal: controller.signal });
  });

  it("disables SDK retries", () => {
    new AnthropicTranslationService({ apiKey: "test-secret" });
    expect(constructed).toEqual([{ apiKey: "test-secret", maxRetries: 0 }]);
  });

  it("skips the call for an empty list", async () => {
    const service = new AnthropicTranslationService({ apiKey: "test-secret" });
    await expect(service.translate([], OPTIONS)).resolves.toEqual([]);
    expect(create).not.toHaveBeenCalled();
  });

  it("marks connection errors, 429 and 5xx as transient", async () => {
    const service = new AnthropicTranslationService({ apiKey: "test-secret" });

    create.mockRejectedValueOnce(new Anthropic.APIConnectionError({ message: "socket hang up" }));
    await expect(service.translate(["白色"], OPTIONS)).rejects.toBeInstanceOf(TransientTranslationError);

    create.mockRejectedValueOnce(new Anthropic.APIError(429, undefined, "rate limited", undefined));
    await expect(service.translate(["白色"], OPTIONS)).rejects.toThrow(TransientTranslationError);

    create.mockRejectedValueOnce(new Anthropic.APIError(529, undefined, "overloaded", undefined));
    await expect(service.translate(["白色"], OPTIONS)).rejects.toThrow("overloaded");
  });

  it("passes client errors through unchanged", async () => {
    const service = new AnthropicTranslationService({ apiKey: "test-secret" });
    const badRequest = new Anthropic.APIError(400, undefined, "invalid request", undefined);
    create.mockRejectedValueOnce(badRequest);

    await expect(service.translate(["白色"], OPTIONS)).rejects.toBe(badRequest);
  });

  it("rejects a reply with the wrong number of items", async () => {
    create.mockResolvedValue(toolReply({ translations: ["белый"] }));
    const service = new AnthropicTranslationService({ apiKey: "test-secret" });

    await expect(service.translate(["白色", "黑色"], OPTIONS)).rejects.toThrow("Expected 2 translations, got 1");
  });

  it("rejects a reply without the tool call", async () => {
    create.mockResolvedValue({ content: [{ type: "text", text: "белый" }] });
    const service = new AnthropicTranslationService({ apiKey: "test-secret" });

    await expect(service.translate(["白色"], OPTIONS)).rejects.toThrow("No report_translations call in response");
  });
});

describe("createTranslationService", () => {
  it("returns null without an API key", () => {
    expect(createTranslationService("", "test-model")).toBeNull();
  });

  it("builds the Anthropic service with a key", () => {
    expect(createTranslationService("test-secret", "test-model")).toBeInstanceOf(AnthropicTranslationService);
  });
});
