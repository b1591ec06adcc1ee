import { describe, expect, it, vi } from "vitest";
import { CompletionFailedError } from "../utils/errors";
import { ChatCompletionClient } from "./completion";

const options = {
  endpoint: "http://llm.test/v1/chat/completions",
  apiKey: "test-secret",
  model: "tiny-test",
  timeoutMs: 500,
};

describe("ChatCompletionClient", () => {
  it("posts a chat request and returns the trimmed content", async () => {
    const fetchMock = vi.fn(
      async () =>
        new Response(
          JSON.stringify({ choices: [{ message: { content: '  {"method": "GET"}\n' } }] }),
          { status: 200 },
        ),
    );
    vi.stubGlobal("fetch", fetchMock);

    const text = await new ChatCompletionClient(options).complete({
      system: "sys",
      user: "pregunta",
    });

    expect(text).toBe('{"method": "GET"}');
    expect(fetchMock).toHaveBeenCalledWith(
      "http://llm.test/v1/chat/completions",
      expect.objectContaining({
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: "Bearer test-secret",
        },
        body: JSON.stringify({
          model: "tiny-test",
          temperature: 0,
          max_tokens: 256,
          messages: [
            { role: "system", content: "sys" },
            { role: "user", content: "pregunta" },
          ],
        }),
      }),
    );
  });

  it("fails on API errors", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("overloaded", { status: 503 })));
    await expect(
      new ChatCompletionClient(options).complete({ system: "s", user: "u" }),
    ).rejects.toThrow(new CompletionFailedError("Completion API error (503): overloaded"));
  });

  it("fails on an unexpected payload", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response('{"choices": []}', { status: 200 })));
    await expect(
      new ChatCompletionClient(options).complete({ system: "s", user: "u" }),
    ).rejects.toBeInstanceOf(CompletionFailedError);
  });
});
