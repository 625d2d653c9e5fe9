import { Readable, Writable } from "node:stream";
import { appendingModel, createLogger, MockTransport, stripAnsi } from "textextend";
import { describe, expect, it, vi } from "vitest";
import type { CLIConfig } from "./config.js";
import type { CLIEnvironment } from "./environment.js";
import { runCLI } from "./program.js";

/**
 * Helper to create a readable stream.
 */
function createReadable(content: string, { isTTY = false } = {}): Readable & { isTTY?: boolean } {
  const stream: Readable & { isTTY?: boolean } = Readable.from([content]);
  stream.isTTY = isTTY;
  return stream;
}

/**
 * Helper to create a writable stream that captures output.
 */
function createWritable() {
  let data = "";
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      data += chunk.toString();
      callback();
    },
  });
  return { stream, read: () => data };
}

interface Harness {
  env: CLIEnvironment;
  stdout: () => string;
  stderr: () => string;
  setExitCode: ReturnType<typeof vi.fn>;
}

/**
 * Helper to create a CLI environment backed by a mock transport.
 */
function createHarness(
  args: string[],
  mock: MockTransport,
  overrides: Partial<CLIEnvironment> = {},
): Harness {
  const stdout = createWritable();
  const stderr = createWritable();
  const setExitCode = vi.fn();

  const env: CLIEnvironment = {
    argv: ["node", "textextend", ...args],
    stdin: createReadable("", { isTTY: true }),
    stdout: stdout.stream,
    stderr: stderr.stream,
    createTransport: () => mock.transport,
    setExitCode,
    createLogger: (name: string) => createLogger({ type: "hidden", name }),
    ...overrides,
  };

  return { env, stdout: stdout.read, stderr: stderr.read, setExitCode };
}

async function run(harness: Harness, config: CLIConfig = {}): Promise<void> {
  await runCLI({ config, env: harness.env });
}

describe("complete command", () => {
  it("extends the prompt and prints the wrapped text", async () => {
    const mock = new MockTransport().replyAlways(appendingModel(" there was a fox."));
    const harness = createHarness(["complete", "Once upon a time", "--seed", "7"], mock);

    await run(harness);

    expect(harness.stdout()).toBe("Once upon a time there was a fox.\n");
    expect(harness.stderr()).toBe("");
    expect(harness.setExitCode).not.toHaveBeenCalled();
    expect(mock.requests).toEqual([
      {
        inputs: "Once upon a time",
        params: { do_sample: true, max_new_tokens: 250, seed: 7, temperature: 0.75 },
      },
    ]);
  });

  it("runs several rounds, each extending the previous text", async () => {
    const mock = new MockTransport().replyAlways(appendingModel(" more"));
    const harness = createHarness(["complete", "Hi", "--rounds", "2"], mock);

    await run(harness);

    expect(harness.stdout()).toBe("Hi more\nHi more more\n");
    expect(mock.requests.map((request) => request.inputs)).toEqual(["Hi", "Hi more"]);
  });

  it("draws a new seed for every round when none is fixed", async () => {
    const mock = new MockTransport().replyAlways(appendingModel("."));
    const harness = createHarness(["complete", "Hi", "--rounds", "2"], mock);

    await run(harness);

    for (const request of mock.requests) {
      expect(Number.isInteger(request.params.seed)).toBe(true);
    }
  });

  it("reads a piped prompt from stdin and normalizes it", async () => {
    const mock = new MockTransport().replyWith([
      { generated_text: "Line one line two.\nSecond paragraph. The end." },
    ]);
    const harness = createHarness(["complete"], mock, {
      stdin: createReadable("Line one\nline two.\n\nSecond paragraph.\n"),
    });

    await run(harness);

    expect(mock.requests[0]?.inputs).toBe("Line one line two.\nSecond paragraph.");
    expect(harness.stdout()).toBe("Line one line two.\n\nSecond paragraph. The end.\n");
  });

  it("wraps output at the requested width", async () => {
    const mock = new MockTransport().replyWith([{ generated_text: "alpha beta gamma delta" }]);
    const harness = createHarness(["complete", "alpha", "--width", "11"], mock);

    await run(harness);

    expect(harness.stdout()).toBe("alpha beta\ngamma delta\n");
  });

  it("layers config, --param and dedicated flags", async () => {
    const mock = new MockTransport().replyAlways(appendingModel("!"));
    const harness = createHarness(
      [
        "complete",
        "Go",
        "--param",
        "top_k=10",
        "--param",
        'stop=["\\n"]',
        "--param",
        "mode=fast",
        "--temperature",
        "0.2",
      ],
      mock,
    );

    await run(harness, {
      complete: {
        temperature: 0.9,
        "max-new-tokens": 50,
        parameters: { top_k: 40, temperature: 0.1, repetition_penalty: 1.2 },
      },
    });

    expect(mock.requests[0]?.params).toEqual({
      do_sample: true,
      max_new_tokens: 50,
      mode: "fast",
      repetition_penalty: 1.2,
      seed: expect.any(Number),
      stop: ["\n"],
      temperature: 0.2,
      top_k: 10,
    });
  });

  it("passes model and token file to the transport factory", async () => {
    const mock = new MockTransport().replyAlways(appendingModel("!"));
    const createTransport = vi.fn(() => mock.transport);
    const harness = createHarness(["complete", "Go", "--model", "gpt2"], mock, {
      createTransport,
    });

    await run(harness, { complete: { "token-file": "/etc/textextend/token" } });

    expect(createTransport).toHaveBeenCalledTimes(1);
    expect(createTransport).toHaveBeenCalledWith(
      expect.objectContaining({ model: "gpt2", tokenFile: "/etc/textextend/token" }),
    );
  });

  it("uses the default model and token file without config", async () => {
    const mock = new MockTransport().replyAlways(appendingModel("!"));
    const createTransport = vi.fn(() => mock.transport);
    const harness = createHarness(["complete", "Go"], mock, { createTransport });

    await run(harness);

    expect(createTransport).toHaveBeenCalledWith(
      expect.objectContaining({ model: "bigscience/bloom", tokenFile: ".hf_token" }),
    );
  });

  it("reports service errors and sets exit code 1", async () => {
    const mock = new MockTransport().replyWith({ error: ["Model too busy"] });
    const harness = createHarness(["complete", "Go"], mock);

    await run(harness);

    expect(stripAnsi(harness.stderr())).toBe(
      "Error: The inference service reported an error: Model too busy\n",
    );
    expect(harness.stdout()).toBe("");
    expect(harness.setExitCode).toHaveBeenCalledWith(1);
  });

  it("stops at the failing round and keeps earlier output", async () => {
    const mock = new MockTransport()
      .replyWith([{ generated_text: "Go on" }])
      .replyWith({ error: ["Rate limit reached"] });
    const harness = createHarness(["complete", "Go", "--rounds", "3"], mock);

    await run(harness);

    expect(harness.stdout()).toBe("Go on\n");
    expect(mock.requests).toHaveLength(2);
    expect(harness.setExitCode).toHaveBeenCalledWith(1);
  });

  it("flags unrecognized payloads as probable bugs", async () => {
    const mock = new MockTransport().replyWith({ error: "Model is loading" });
    const harness = createHarness(["complete", "Go"], mock);

    await run(harness);

    expect(stripAnsi(harness.stderr())).toBe(
      'Error: Unexpected response from inference service: {"error":"Model is loading"} (this is probably a bug)\n',
    );
  });

  it("rejects reserved parameter names", async () => {
    const mock = new MockTransport();
    const harness = createHarness(["complete", "Go", "--param", "_secret=1"], mock);

    await run(harness);

    expect(stripAnsi(harness.stderr())).toBe(
      'Error: cannot set parameter "_secret": names with a leading "_" are reserved\n',
    );
    expect(mock.requests).toEqual([]);
  });

  it("requires a prompt when stdin is a terminal", async () => {
    const mock = new MockTransport();
    const harness = createHarness(["complete"], mock);

    await run(harness);

    expect(stripAnsi(harness.stderr())).toBe(
      "Error: Prompt is required. Provide an argument or pipe content via stdin.\n",
    );
    expect(harness.setExitCode).toHaveBeenCalledWith(1);
  });

  it("rejects an empty piped prompt", async () => {
    const mock = new MockTransport();
    const harness = createHarness(["complete"], mock, { stdin: createReadable(" \n\n ") });

    await run(harness);

    expect(stripAnsi(harness.stderr())).toBe(
      "Error: Received empty stdin payload. Provide a prompt to continue.\n",
    );
  });

  it("reports transport setup failures", async () => {
    const mock = new MockTransport();
    const harness = createHarness(["complete", "Go"], mock, {
      createTransport: () => {
        throw new Error("No Inference API token found");
      },
    });

    await run(harness);

    expect(stripAnsi(harness.stderr())).toBe("Error: No Inference API token found\n");
    expect(harness.setExitCode).toHaveBeenCalledWith(1);
  });
});
