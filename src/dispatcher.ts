import {
  EmbeddedBackend,
  MANAGED_JAVA_OPTIONS,
  SubprocessBackend,
  buildJavaOptions,
  loadJavaRuntime,
  spawnProcess,
  type EngineBackend,
  type JavaRuntimeLoader,
  type ProcessRunner,
  type SubprocessSettings,
} from "./backend.js";
import { resolveEngineConfig, type EngineConfig, type Env } from "./config.js";
import { EmbeddedRuntimeUnavailableError } from "./errors.js";
import type { ExtractionOption } from "./extraction-option.js";
import { consoleLogger, type Logger } from "./logger.js";

export type DispatcherState =
  | { kind: "uninitialized" }
  | { kind: "embedded"; backend: EngineBackend }
  | { kind: "subprocess"; backend: SubprocessBackend };

export interface InvokeSettings {
  /** JVM options, as a list or a shell-style string. Fixed once an embedded JVM has started. */
  javaOptions?: string | string[];
  /** Encoding of the engine's output (default "utf-8"). */
  encoding?: string;
  /** Skip the embedded runtime and run `java -jar`. */
  forceSubprocess?: boolean;
}

export interface BackendDispatcherOptions {
  logger?: Logger;
  env?: Env;
  loadRuntime?: JavaRuntimeLoader;
  runner?: ProcessRunner;
  platform?: NodeJS.Platform;
}

/**
 * Chooses how to reach tabula-java and remembers the choice.
 *
 * The first call tries the embedded runtime and falls back to a child process
 * when it cannot be loaded. Create one dispatcher per application and share it:
 * an embedded JVM cannot be restarted with other options.
 */
export class BackendDispatcher {
  private state: DispatcherState = { kind: "uninitialized" };
  private queue: Promise<void> = Promise.resolve();

  private readonly logger: Logger;
  private readonly config: EngineConfig;
  private readonly loadRuntime: JavaRuntimeLoader;
  private readonly runner: ProcessRunner;
  private readonly platform: NodeJS.Platform;

  constructor(options: BackendDispatcherOptions = {}) {
    this.logger = options.logger ?? consoleLogger;
    this.config = resolveEngineConfig(options.env);
    this.loadRuntime = options.loadRuntime ?? loadJavaRuntime;
    this.runner = options.runner ?? spawnProcess;
    this.platform = options.platform ?? process.platform;
  }

  get kind(): DispatcherState["kind"] {
    return this.state.kind;
  }

  get backend(): EngineBackend | null {
    return this.state.kind === "uninitialized" ? null : this.state.backend;
  }

  /**
   * Render the option and run the engine on `inputPath`.
   * Invalid options throw before any backend is touched.
   */
  async invoke(
    option: ExtractionOption,
    inputPath?: string,
    settings: InvokeSettings = {}
  ): Promise<string> {
    const args = option.buildArgs(this.logger);
    const backend = await this.exclusive(() => this.select(option, settings));

    // One embedded JVM serves every call; child processes are independent.
    if (backend.kind === "embedded") {
      return this.exclusive(() => backend.invoke(args, inputPath));
    }
    return backend.invoke(args, inputPath);
  }

  private async select(option: ExtractionOption, settings: InvokeSettings): Promise<EngineBackend> {
    const encoding = settings.encoding ?? "utf-8";
    const subprocessSettings: SubprocessSettings = {
      javaOptions: buildJavaOptions(settings.javaOptions, encoding, this.platform),
      silent: option.silent ?? false,
      encoding,
    };

    if (settings.forceSubprocess) {
      return this.useSubprocess(subprocessSettings);
    }

    switch (this.state.kind) {
      case "uninitialized":
        return this.initialize(subprocessSettings);
      case "subprocess":
        return this.useSubprocess(subprocessSettings);
      case "embedded": {
        const ignored = subprocessSettings.javaOptions.filter(o => !MANAGED_JAVA_OPTIONS.has(o));
        if (ignored.length > 0) {
          this.logger.warn(
            `javaOptions [${ignored.join(" ")}] are ignored until the Node.js process restarts.`
          );
        }
        return this.state.backend;
      }
    }
  }

  private async initialize(settings: SubprocessSettings): Promise<EngineBackend> {
    try {
      const backend = await EmbeddedBackend.create({
        loadRuntime: this.loadRuntime,
        javaOptions: settings.javaOptions,
        silent: settings.silent,
        jarPath: this.config.jarPath,
      });
      this.state = { kind: "embedded", backend };
      this.logger.debug("Using the embedded Java runtime.");
      return backend;
    } catch (err) {
      if (!(err instanceof EmbeddedRuntimeUnavailableError)) throw err;
      this.logger.warn(`${err.message}. Falling back to subprocess.`);
      return this.useSubprocess(settings);
    }
  }

  private useSubprocess(settings: SubprocessSettings): SubprocessBackend {
    if (this.state.kind === "subprocess") {
      this.state.backend.configure(settings);
      return this.state.backend;
    }
    const backend = new SubprocessBackend(settings, this.config, this.logger, this.runner);
    this.state = { kind: "subprocess", backend };
    return backend;
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    // Keep the queue going after a failed task; the failure reaches the caller through `run`.
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
