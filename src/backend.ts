import { spawn } from "node:child_process";
import { TextDecoder } from "node:util";
import { parseArgsStringToArgv } from "string-argv";
import type { EngineConfig } from "./config.js";
import {
  EmbeddedRuntimeUnavailableError,
  EngineExecutionError,
  EngineNotFoundError,
  InvalidOptionError,
} from "./errors.js";
import type { Logger } from "./logger.js";

export const ENGINE_CLASS = "technology.tabula.CommandLineApp";

// tabula-java logs through slf4j and commons-logging regardless of --silent.
export const SILENT_JAVA_OPTIONS = [
  "-Dorg.slf4j.simpleLogger.defaultLogLevel=off",
  "-Dorg.apache.commons.logging.Log=org.apache.commons.logging.impl.NoOpLog",
] as const;

/** JVM options added by this package; they never count as caller settings. */
export const MANAGED_JAVA_OPTIONS: ReadonlySet<string> = new Set([
  "-Djava.awt.headless=true",
  "-Dfile.encoding=UTF8",
  ...SILENT_JAVA_OPTIONS,
]);

const JAVA_NOT_FOUND_MESSAGE =
  "`java` command is not found from this Node.js process. " +
  "Please ensure Java is installed and PATH is set for `java`, or set TABULA_JAVA.";

export type BackendKind = "embedded" | "subprocess";

export interface EngineBackend {
  readonly kind: BackendKind;
  /** Run the engine with rendered arguments; the input file, if any, is appended. */
  invoke(args: readonly string[], inputPath?: string): Promise<string>;
}

/**
 * Normalize caller JVM options: a string is split like a shell would, macOS
 * gets a headless AWT so the JVM does not steal focus, and UTF-8 output
 * forces the JVM file encoding.
 */
export function buildJavaOptions(
  javaOptions: string | readonly string[] | undefined,
  encoding: string,
  platform: NodeJS.Platform = process.platform
): string[] {
  const options =
    typeof javaOptions === "string" ? parseArgsStringToArgv(javaOptions) : [...(javaOptions ?? [])];

  if (platform === "darwin" && !options.some(o => o.includes("java.awt.headless"))) {
    options.push("-Djava.awt.headless=true");
  }
  if (isUtf8(encoding) && !options.some(o => o.includes("file.encoding"))) {
    options.push("-Dfile.encoding=UTF8");
  }
  return options;
}

export function withSilentOptions(javaOptions: readonly string[], silent: boolean): string[] {
  const options = [...javaOptions];
  if (silent) {
    for (const flag of SILENT_JAVA_OPTIONS) {
      if (!options.includes(flag)) options.push(flag);
    }
  }
  return options;
}

function isUtf8(encoding: string): boolean {
  const normalized = encoding.toLowerCase();
  return normalized === "utf-8" || normalized === "utf8";
}

export interface ProcessResult {
  exitCode: number | null;
  stdout: Buffer;
  stderr: Buffer;
}

export type ProcessRunner = (command: string, args: readonly string[]) => Promise<ProcessResult>;

export const spawnProcess: ProcessRunner = (command, args) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, [...args], { stdio: ["ignore", "pipe", "pipe"] });
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];

    child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));
    child.on("error", reject);
    child.on("close", exitCode => {
      resolve({ exitCode, stdout: Buffer.concat(stdout), stderr: Buffer.concat(stderr) });
    });
  });

export interface SubprocessSettings {
  javaOptions: readonly string[];
  silent: boolean;
  encoding: string;
}

export class SubprocessBackend implements EngineBackend {
  readonly kind = "subprocess";

  private javaOptions: string[] = [];
  private decoder: TextDecoder = new TextDecoder();

  constructor(
    settings: SubprocessSettings,
    private readonly config: EngineConfig,
    private readonly logger: Logger,
    private readonly runner: ProcessRunner = spawnProcess
  ) {
    this.configure(settings);
  }

  get settings(): { javaOptions: readonly string[]; encoding: string } {
    return { javaOptions: this.javaOptions, encoding: this.decoder.encoding };
  }

  /** Apply new settings to this backend; later invocations use them. */
  configure(settings: SubprocessSettings): void {
    this.decoder = createDecoder(settings.encoding);
    this.javaOptions = withSilentOptions(settings.javaOptions, settings.silent);
  }

  async invoke(args: readonly string[], inputPath?: string): Promise<string> {
    const command = [...this.javaOptions, "-jar", this.config.jarPath, ...args];
    if (inputPath) command.push(inputPath);

    let result: ProcessResult;
    try {
      result = await this.runner(this.config.javaCommand, command);
    } catch (err) {
      if (isMissingExecutable(err)) {
        throw new EngineNotFoundError(JAVA_NOT_FOUND_MESSAGE, { cause: err });
      }
      throw err;
    }

    const stderr = this.decoder.decode(result.stderr);
    if (result.exitCode !== 0) {
      this.logger.error(`Error from tabula-java:\n${stderr}`);
      throw new EngineExecutionError(
        `tabula-java exited with ${result.exitCode === null ? "a signal" : `code ${result.exitCode}`}`,
        stderr,
        result.exitCode
      );
    }
    if (stderr) {
      this.logger.warn(`Got stderr: ${stderr}`);
    }
    return this.decoder.decode(result.stdout);
  }
}

function createDecoder(encoding: string): TextDecoder {
  try {
    return new TextDecoder(encoding);
  } catch (err) {
    throw new InvalidOptionError(`Unsupported encoding: ${encoding}`, { cause: err });
  }
}

function isMissingExecutable(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/** The part of the `java` (node-java) module this package relies on. */
export interface JavaRuntime {
  classpath: string[];
  options: string[];
  isJvmCreated(): boolean;
  import(className: string): unknown;
  newInstanceSync(className: string, ...args: unknown[]): unknown;
  callStaticMethodSync(className: string, methodName: string, ...args: unknown[]): unknown;
  newArray(className: string, values: unknown[]): unknown;
}

export type JavaRuntimeLoader = () => Promise<JavaRuntime>;

const JAVA_MODULE = "java";

/** Load node-java, an optional peer dependency. */
export const loadJavaRuntime: JavaRuntimeLoader = async () => {
  let mod: unknown;
  try {
    mod = await import(JAVA_MODULE);
  } catch (err) {
    throw new EmbeddedRuntimeUnavailableError(`Cannot load the '${JAVA_MODULE}' package`, {
      cause: err,
    });
  }
  const runtime = isObject(mod) && "default" in mod ? mod.default : mod;
  if (!isJavaRuntime(runtime)) {
    throw new EmbeddedRuntimeUnavailableError(
      `The '${JAVA_MODULE}' package does not expose the expected API`
    );
  }
  return runtime;
};

export interface EmbeddedBackendParams {
  loadRuntime: JavaRuntimeLoader;
  javaOptions: readonly string[];
  silent: boolean;
  jarPath: string;
}

/**
 * Calls tabula-java's CommandLineApp inside a JVM hosted by this process.
 * The JVM starts once; its options are fixed from then on.
 */
export class EmbeddedBackend implements EngineBackend {
  readonly kind = "embedded";

  private constructor(private readonly runtime: JavaRuntime) {}

  /** Throws EmbeddedRuntimeUnavailableError when the runtime or the engine classes cannot be loaded. */
  static async create(params: EmbeddedBackendParams): Promise<EmbeddedBackend> {
    let runtime: JavaRuntime;
    try {
      runtime = await params.loadRuntime();
    } catch (err) {
      if (err instanceof EmbeddedRuntimeUnavailableError) throw err;
      throw new EmbeddedRuntimeUnavailableError("Cannot load the Java runtime", { cause: err });
    }

    try {
      if (!runtime.isJvmCreated()) {
        runtime.classpath.push(params.jarPath);
        runtime.options.push(...withSilentOptions(params.javaOptions, params.silent));
      }
      runtime.import(ENGINE_CLASS);
    } catch (err) {
      throw new EmbeddedRuntimeUnavailableError(`Cannot load ${ENGINE_CLASS}`, { cause: err });
    }

    return new EmbeddedBackend(runtime);
  }

  async invoke(args: readonly string[], inputPath?: string): Promise<string> {
    const argv = inputPath ? [inputPath, ...args] : [...args];
    const java = this.runtime;

    try {
      const output = java.newInstanceSync("java.lang.StringBuilder");
      const parser = java.newInstanceSync("org.apache.commons.cli.DefaultParser");
      const cliOptions = java.callStaticMethodSync(ENGINE_CLASS, "buildOptions");
      const commandLine = callMethod(
        parser,
        "parseSync",
        cliOptions,
        java.newArray("java.lang.String", argv)
      );
      const app = java.newInstanceSync(ENGINE_CLASS, output, commandLine);
      callMethod(app, "extractTablesSync", commandLine);

      const text = callMethod(output, "toStringSync");
      if (typeof text !== "string") {
        throw new TypeError("StringBuilder.toString did not return a string");
      }
      return text;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new EngineExecutionError(`tabula-java failed: ${message}`, message, null, {
        cause: err,
      });
    }
  }
}

function isObject(value: unknown): value is object {
  return typeof value === "object" && value !== null;
}

function isJavaRuntime(value: unknown): value is JavaRuntime {
  if (!isObject(value)) return false;
  return (
    Array.isArray(Reflect.get(value, "classpath")) &&
    Array.isArray(Reflect.get(value, "options")) &&
    ["isJvmCreated", "import", "newInstanceSync", "callStaticMethodSync", "newArray"].every(
      name => typeof Reflect.get(value, name) === "function"
    )
  );
}

function callMethod(target: unknown, name: string, ...args: unknown[]): unknown {
  if (!isObject(target)) {
    throw new TypeError(`Cannot call ${name} on ${String(target)}`);
  }
  const method: unknown = Reflect.get(target, name);
  if (typeof method !== "function") {
    throw new TypeError(`${name} is not a method`);
  }
  return Reflect.apply(method, target, args);
}
