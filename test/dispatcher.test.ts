import { describe, expect, it, vi } from "vitest";
import {
  BackendDispatcher,
  EmbeddedRuntimeUnavailableError,
  ExtractionOption,
  InvalidRegionError,
  SubprocessBackend,
} from "../src/index.js";
import type { JavaRuntime, ProcessRunner } from "../src/index.js";
import { SILENT_JAVA_OPTIONS } from "../src/backend.js";

const env = { TABULA_JAR: "/opt/tabula.jar", TABULA_JAVA: "/usr/bin/java" };

function spyLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function fakeRuntime(output: string): JavaRuntime {
  let text = "";
  return {
    classpath: [],
    options: [],
    isJvmCreated: () => false,
    import: () => ({}),
    newInstanceSync: className => {
      if (className === "java.lang.StringBuilder") {
        text = "";
        return { toStringSync: () => text };
      }
      if (className === "org.apache.commons.cli.DefaultParser") return { parseSync: () => ({}) };
      return {
        extractTablesSync: () => {
          text += output;
        },
      };
    },
    callStaticMethodSync: () => ({}),
    newArray: (_className, values) => values,
  };
}

const unavailable = async (): Promise<JavaRuntime> => {
  throw new EmbeddedRuntimeUnavailableError("Cannot load the 'java' package");
};

function recordingRunner(stdout = "out") {
  const calls: Array<{ command: string; args: readonly string[] }> = [];
  const runner: ProcessRunner = async (command, args) => {
    calls.push({ command, args });
    return { exitCode: 0, stdout: Buffer.from(stdout), stderr: Buffer.alloc(0) };
  };
  return { calls, runner };
}

const option = new ExtractionOption({ pages: 1 });

describe("BackendDispatcher", () => {
  it("uses the embedded runtime when it loads", async () => {
    const logger = spyLogger();
    const dispatcher = new BackendDispatcher({
      logger,
      env,
      loadRuntime: async () => fakeRuntime("[]"),
      platform: "linux",
    });

    expect(dispatcher.kind).toBe("uninitialized");
    expect(await dispatcher.invoke(option, "/tmp/in.pdf")).toBe("[]");
    expect(dispatcher.kind).toBe("embedded");
    expect(logger.debug).toHaveBeenCalledWith("Using the embedded Java runtime.");
  });

  it("falls back to a subprocess once and remembers it", async () => {
    const logger = spyLogger();
    const loadRuntime = vi.fn(unavailable);
    const { calls, runner } = recordingRunner();
    const dispatcher = new BackendDispatcher({ logger, env, loadRuntime, runner, platform: "linux" });

    expect(await dispatcher.invoke(option, "/tmp/in.pdf")).toBe("out");
    expect(await dispatcher.invoke(option, "/tmp/in.pdf")).toBe("out");

    expect(dispatcher.kind).toBe("subprocess");
    expect(loadRuntime).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith(
      "Cannot load the 'java' package. Falling back to subprocess."
    );
    expect(calls[0]).toEqual({
      command: "/usr/bin/java",
      args: ["-Dfile.encoding=UTF8", "-jar", "/opt/tabula.jar", "--pages", "1", "--guess", "/tmp/in.pdf"],
    });
  });

  it("falls back when the loader fails with an unrelated error", async () => {
    const { runner } = recordingRunner();
    const dispatcher = new BackendDispatcher({
      logger: spyLogger(),
      env,
      loadRuntime: async () => {
        throw new Error("native module did not build");
      },
      runner,
    });

    await dispatcher.invoke(option, "/tmp/in.pdf");

    expect(dispatcher.kind).toBe("subprocess");
  });

  it("skips the embedded runtime when a subprocess is forced", async () => {
    const loadRuntime = vi.fn(async () => fakeRuntime("[]"));
    const { runner } = recordingRunner();
    const dispatcher = new BackendDispatcher({ logger: spyLogger(), env, loadRuntime, runner });

    await dispatcher.invoke(option, "/tmp/in.pdf", { forceSubprocess: true });

    expect(dispatcher.kind).toBe("subprocess");
    expect(loadRuntime).not.toHaveBeenCalled();
  });

  it("switches from the embedded runtime to a forced subprocess", async () => {
    const { runner } = recordingRunner();
    const dispatcher = new BackendDispatcher({
      logger: spyLogger(),
      env,
      loadRuntime: async () => fakeRuntime("[]"),
      runner,
    });

    await dispatcher.invoke(option, "/tmp/in.pdf");
    expect(dispatcher.kind).toBe("embedded");

    expect(await dispatcher.invoke(option, "/tmp/in.pdf", { forceSubprocess: true })).toBe("out");
    expect(dispatcher.kind).toBe("subprocess");
  });

  it("reconfigures the subprocess backend in place", async () => {
    const { runner } = recordingRunner();
    const dispatcher = new BackendDispatcher({
      logger: spyLogger(),
      env,
      loadRuntime: unavailable,
      runner,
      platform: "linux",
    });

    await dispatcher.invoke(option, "/tmp/in.pdf");
    const backend = dispatcher.backend;

    await dispatcher.invoke(option.with({ silent: true }), "/tmp/in.pdf", {
      javaOptions: "-Xmx1g",
      encoding: "latin1",
    });

    expect(dispatcher.backend).toBe(backend);
    expect(backend).toBeInstanceOf(SubprocessBackend);
    if (!(backend instanceof SubprocessBackend)) return;
    expect(backend.settings).toEqual({
      javaOptions: ["-Xmx1g", ...SILENT_JAVA_OPTIONS],
      encoding: "windows-1252",
    });
  });

  it("warns that new JVM options are ignored by a running embedded runtime", async () => {
    const logger = spyLogger();
    const dispatcher = new BackendDispatcher({
      logger,
      env,
      loadRuntime: async () => fakeRuntime("[]"),
      platform: "linux",
    });

    await dispatcher.invoke(option, "/tmp/in.pdf");
    await dispatcher.invoke(option.with({ silent: true }), "/tmp/in.pdf");
    expect(logger.warn).not.toHaveBeenCalled();

    await dispatcher.invoke(option, "/tmp/in.pdf", { javaOptions: ["-Xmx512m"] });
    expect(logger.warn).toHaveBeenCalledWith(
      "javaOptions [-Xmx512m] are ignored until the Node.js process restarts."
    );
  });

  it("validates the option before loading any backend", async () => {
    const loadRuntime = vi.fn(async () => fakeRuntime("[]"));
    const dispatcher = new BackendDispatcher({ logger: spyLogger(), env, loadRuntime });

    await expect(
      dispatcher.invoke(new ExtractionOption({ pages: 1, area: [10, 10, 5, 50] }), "/tmp/in.pdf")
    ).rejects.toBeInstanceOf(InvalidRegionError);
    expect(loadRuntime).not.toHaveBeenCalled();
    expect(dispatcher.kind).toBe("uninitialized");
  });

  it("serves concurrent calls from one embedded runtime", async () => {
    const loadRuntime = vi.fn(async () => fakeRuntime("[]"));
    const dispatcher = new BackendDispatcher({ logger: spyLogger(), env, loadRuntime });

    const outputs = await Promise.all([
      dispatcher.invoke(option, "/tmp/a.pdf"),
      dispatcher.invoke(option, "/tmp/b.pdf"),
    ]);

    expect(loadRuntime).toHaveBeenCalledTimes(1);
    expect(outputs).toEqual(["[]", "[]"]);
  });
});
