import { Agent, MaxTurnsExceededError, ModelBehaviorError, type Runner } from "@openai/agents";
import { describe, expect, it, vi } from "vitest";
import { AgentsTextGenerator, lastAssistantTextFromAgentsError, toRawText } from "../src/pipeline/agents.js";
import { WriterOutputSchema } from "../src/pipeline/schemas.js";

type RunOptions = { maxTurns: number; signal?: AbortSignal };

function runnerMock(impl: (agent: unknown, prompt: string, options: RunOptions) => Promise<{ finalOutput?: unknown }>) {
  const run = vi.fn(impl);
  return { run, runner: { run } as unknown as Runner };
}

function withRejectedOutput<E extends Error>(err: E, text: string): E {
  return Object.assign(err, {
    state: {
      _modelResponses: [
        { output: [{ role: "assistant", content: [{ type: "output_text", text }] }] }
      ]
    }
  });
}

const REQUEST = { name: "Writer", instructions: "Write a page.", prompt: "Context:{}" };

describe("AgentsTextGenerator", () => {
  it("runs one agent turn with the output shape and returns structured output as JSON text", async () => {
    const { run, runner } = runnerMock(async () => ({ finalOutput: { story: "Go" } }));
    const generator = new AgentsTextGenerator({ model: "test-model", runner });
    const signal = new AbortController().signal;

    const raw = await generator.generateText({
      ...REQUEST,
      outputShape: { name: "comic_page", schema: WriterOutputSchema },
      signal
    });

    expect(raw).toBe('{"story":"Go"}');
    expect(run).toHaveBeenCalledTimes(1);
    const [agent, prompt, options] = run.mock.calls[0] ?? [];
    expect(agent).toBeInstanceOf(Agent);
    expect(agent).toHaveProperty("name", "Writer");
    expect(agent).toHaveProperty("outputType", WriterOutputSchema);
    expect(prompt).toBe("Context:{}");
    expect(options).toEqual({ maxTurns: 1, signal });
  });

  it("returns plain text output untouched", async () => {
    const { runner } = runnerMock(async () => ({ finalOutput: "```json\n{}\n```" }));
    await expect(new AgentsTextGenerator({ model: "test-model", runner }).generateText(REQUEST)).resolves.toBe("```json\n{}\n```");
  });

  it("recovers the rejected assistant text after a schema failure", async () => {
    const { runner } = runnerMock(async () => {
      throw withRejectedOutput(new ModelBehaviorError("Invalid output type"), '{"story":"partial"}');
    });
    await expect(new AgentsTextGenerator({ model: "test-model", runner }).generateText(REQUEST)).resolves.toBe('{"story":"partial"}');
  });

  it("recovers from a max-turns failure too", async () => {
    const { runner } = runnerMock(async () => {
      throw withRejectedOutput(new MaxTurnsExceededError("Max turns (1) exceeded"), "plain words");
    });
    await expect(new AgentsTextGenerator({ model: "test-model", runner }).generateText(REQUEST)).resolves.toBe("plain words");
  });

  it("rethrows when nothing can be recovered", async () => {
    const bare = runnerMock(async () => {
      throw new ModelBehaviorError("Invalid output type");
    });
    await expect(new AgentsTextGenerator({ model: "test-model", runner: bare.runner }).generateText(REQUEST)).rejects.toThrow(
      "Invalid output type"
    );

    const network = runnerMock(async () => {
      throw new Error("socket hang up");
    });
    await expect(new AgentsTextGenerator({ model: "test-model", runner: network.runner }).generateText(REQUEST)).rejects.toThrow(
      "socket hang up"
    );

    const empty = runnerMock(async () => ({}));
    await expect(new AgentsTextGenerator({ model: "test-model", runner: empty.runner }).generateText(REQUEST)).rejects.toThrow(
      "Writer produced no final output"
    );
  });
});

describe("agent output helpers", () => {
  it("reads the last assistant text, refusals included", () => {
    const err = Object.assign(new Error("bad"), {
      state: {
        _modelResponses: [
          { output: [{ role: "assistant", content: [{ type: "output_text", text: "first" }] }] },
          { output: [{ role: "assistant", content: [{ type: "refusal", refusal: "I can't draw that." }] }, { role: "user", content: [] }] }
        ]
      }
    });
    expect(lastAssistantTextFromAgentsError(err)).toBe("I can't draw that.");
    expect(lastAssistantTextFromAgentsError(new Error("no state"))).toBeNull();
    expect(lastAssistantTextFromAgentsError(null)).toBeNull();
  });

  it("serializes final output", () => {
    expect(toRawText("text", "Writer")).toBe("text");
    expect(toRawText({ a: 1 }, "Writer")).toBe('{"a":1}');
    expect(() => toRawText(undefined, "Illustrator")).toThrow("Illustrator produced no final output");
  });
});
