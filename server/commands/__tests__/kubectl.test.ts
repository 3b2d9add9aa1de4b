import { EventEmitter } from "events";
import { PassThrough } from "stream";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const { spawnMock } = vi.hoisted(() => ({
  spawnMock: vi.fn(),
}));

vi.mock("child_process", () => ({
  spawn: spawnMock,
}));

import { KubectlCommandError, KubectlRunner, TRUNCATION_MARKER, truncateOutput } from "../kubectl";

class FakeChild extends EventEmitter {
  stdout = new PassThrough();
  stderr = new PassThrough();
  kill = vi.fn(() => true);
}

async function finish(child: FakeChild, exitCode: number): Promise<void> {
  const drained = Promise.all([
    new Promise((resolve) => child.stdout.once("end", resolve)),
    new Promise((resolve) => child.stderr.once("end", resolve)),
  ]);
  child.stdout.end();
  child.stderr.end();
  await drained;
  child.emit("close", exitCode);
}

describe("truncateOutput", () => {
  it("keeps output within the byte limit", () => {
    expect(truncateOutput("héllo", 6)).toEqual({ content: "héllo", truncated: false });
  });

  it("cuts by UTF-8 bytes without splitting a character", () => {
    expect(truncateOutput("héllo", 2)).toEqual({
      content: `h${TRUNCATION_MARKER}`,
      truncated: true,
    });
    expect(truncateOutput("日本語ログ", 7)).toEqual({
      content: `日本${TRUNCATION_MARKER}`,
      truncated: true,
    });
  });
});

describe("KubectlRunner", () => {
  let child: FakeChild;

  beforeEach(() => {
    child = new FakeChild();
    spawnMock.mockReset();
    spawnMock.mockReturnValue(child);
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("rejects blocked commands before spawning anything", async () => {
    const runner = new KubectlRunner({ clusterContext: "kind-dev" });

    const error = await runner.run(["delete", "pod", "api-1"]).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(KubectlCommandError);
    expect(error).toMatchObject({
      code: "COMMAND_BLOCKED",
      retryable: false,
      message: "Subcommand not allowed: delete",
    });
    expect(spawnMock).not.toHaveBeenCalled();
  });

  it("spawns kubectl with the configured context and no shell", async () => {
    const runner = new KubectlRunner({ clusterContext: " kind-dev " });

    const pending = runner.run(["logs", "api-1", "-n", "shop"]);
    await finish(child, 0);
    await pending;

    expect(spawnMock).toHaveBeenCalledWith(
      "kubectl",
      ["--context", "kind-dev", "logs", "api-1", "-n", "shop"],
      expect.objectContaining({ stdio: ["ignore", "pipe", "pipe"] }),
    );
  });

  it("decodes multi-byte characters split across chunks", async () => {
    const runner = new KubectlRunner();
    const text = Buffer.from("café ☕ ready\n", "utf8");

    const pending = runner.run(["logs", "api-1"]);
    child.stdout.write(text.subarray(0, 4));
    child.stdout.write(text.subarray(4, 8));
    child.stdout.write(text.subarray(8));
    await finish(child, 0);

    await expect(pending).resolves.toMatchObject({
      stdout: "café ☕ ready\n",
      exitCode: 0,
      truncated: false,
    });
  });

  it("redacts secrets and reports a non-zero exit", async () => {
    const runner = new KubectlRunner();

    const pending = runner.run(["get", "pods"]);
    child.stderr.write("error: token=test-secret rejected\n");
    await finish(child, 1);

    await expect(pending).resolves.toMatchObject({
      stderr: "error: token=[REDACTED] rejected\n",
      exitCode: 1,
    });
  });

  it("wraps spawn failures", async () => {
    const runner = new KubectlRunner();

    const pending = runner.run(["get", "pods"]);
    child.emit("error", new Error("spawn kubectl ENOENT"));

    await expect(pending).rejects.toMatchObject({
      code: "COMMAND_FAILED",
      retryable: true,
      message: "Failed to execute kubectl: spawn kubectl ENOENT",
    });
  });
});
