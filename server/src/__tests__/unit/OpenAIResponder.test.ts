/**
 * OpenAIResponder Unit Tests
 */

// ── Mocks (must be before imports for jest hoisting) ────────────────────

const mockCompletionCreate = jest.fn();

jest.mock("openai", () => {
  return {
    __esModule: true,
    default: jest.fn().mockImplementation(() => ({
      chat: {
        completions: {
          create: mockCompletionCreate,
        },
      },
    })),
  };
});

import { OpenAIResponder } from "../../services/OpenAIResponder.js";
import { ChatMessage } from "../../storage/ConversationHistory.js";

// ── Tests ───────────────────────────────────────────────────────────────

describe("OpenAIResponder", () => {
  const history: ChatMessage[] = [
    { role: "system", content: "Be brief." },
    { role: "user", content: "Best starting class?" },
    { role: "assistant", content: "The knight." },
    { role: "user", content: "Why?" },
  ];

  const createResponder = () =>
    new OpenAIResponder({
      apiKey: "test-key",
      model: "gpt-4o-mini",
      temperature: 0.7,
      maxTokens: 300,
    });

  beforeEach(() => {
    jest.clearAllMocks();
    mockCompletionCreate.mockResolvedValue({
      choices: [{ message: { content: " High armor early on. " } }],
    });
    jest.spyOn(console, "log").mockImplementation();
    jest.spyOn(console, "error").mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("should send the whole history with the configured settings", async () => {
    const controller = new AbortController();

    await createResponder().generate(history, { signal: controller.signal });

    expect(mockCompletionCreate).toHaveBeenCalledWith(
      {
        model: "gpt-4o-mini",
        messages: history,
        temperature: 0.7,
        max_tokens: 300,
      },
      { signal: controller.signal },
    );
  });

  it("should return the trimmed reply", async () => {
    expect(await createResponder().generate(history)).toBe("High armor early on.");
  });

  it("should return an empty string when the reply has no content", async () => {
    mockCompletionCreate.mockResolvedValueOnce({
      choices: [{ message: { content: null } }],
    });
    expect(await createResponder().generate(history)).toBe("");
  });

  it("should return an empty string when there are no choices", async () => {
    mockCompletionCreate.mockResolvedValueOnce({ choices: [] });
    expect(await createResponder().generate(history)).toBe("");
  });

  it("should log and rethrow API failures", async () => {
    mockCompletionCreate.mockRejectedValueOnce(new Error("context length exceeded"));

    await expect(createResponder().generate(history)).rejects.toThrow(
      "context length exceeded",
    );
    expect(console.error).toHaveBeenCalledWith(
      "[LLM] Error generating response:",
      expect.any(Error),
    );
  });
});
