import { mkdtemp, rm, stat, writeFile } from "node:fs/promises";
import { homedir, tmpdir } from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { InputFileError } from "./errors.js";

/** A file path, a URL (string or object), or the file's bytes. */
export type InputSource = string | URL | Uint8Array;

export interface LocalizeOptions {
  /** User-Agent header sent when downloading a remote source. */
  userAgent?: string;
  /** Extension given to temporary copies (default ".pdf"). */
  suffix?: string;
}

export interface LocalFile {
  path: string;
  temporary: boolean;
  cleanup(): Promise<void>;
}

const REMOTE_PROTOCOLS = new Set(["http:", "https:"]);

/**
 * Make the source available as a file on disk. Buffers and remote files are
 * copied into a fresh temporary directory that `cleanup` removes.
 */
export async function localizeFile(
  source: InputSource,
  options: LocalizeOptions = {}
): Promise<LocalFile> {
  const suffix = options.suffix ?? ".pdf";

  if (source instanceof Uint8Array) {
    return writeTemporary(`input${suffix}`, source);
  }

  const url = asUrl(source);
  if (url && REMOTE_PROTOCOLS.has(url.protocol)) {
    return download(url, suffix, options.userAgent);
  }
  if (url && url.protocol === "file:") {
    return persistent(fileURLToPath(url));
  }
  if (typeof source !== "string") {
    throw new InputFileError(`Unsupported URL protocol: ${source.protocol}`);
  }
  return persistent(expandHome(source));
}

/** Run `fn` with a local copy of the source, removing temporary copies afterwards. */
export async function withLocalFile<T>(
  source: InputSource,
  options: LocalizeOptions,
  fn: (filePath: string) => Promise<T>
): Promise<T> {
  const file = await localizeFile(source, options);
  try {
    return await fn(file.path);
  } finally {
    await file.cleanup();
  }
}

/** Throws unless the path is an existing, non-empty file. */
export async function assertReadableFile(filePath: string): Promise<void> {
  let size: number;
  try {
    size = (await stat(filePath)).size;
  } catch (err) {
    throw new InputFileError(`${filePath} does not exist`, { cause: err });
  }
  if (size === 0) {
    throw new InputFileError(`${filePath} is empty. Check the file, or download it manually.`);
  }
}

function asUrl(source: string | URL): URL | null {
  if (source instanceof URL) return source;
  // Windows drive letters parse as a one-letter scheme.
  if (!/^[a-z][a-z0-9+.-]+:/i.test(source)) return null;
  try {
    return new URL(source);
  } catch {
    return null;
  }
}

function expandHome(filePath: string): string {
  if (filePath === "~") return homedir();
  if (filePath.startsWith("~/")) return path.join(homedir(), filePath.slice(2));
  return filePath;
}

function persistent(filePath: string): LocalFile {
  return { path: filePath, temporary: false, cleanup: async () => {} };
}

async function writeTemporary(fileName: string, data: Uint8Array): Promise<LocalFile> {
  const dir = await mkdtemp(path.join(tmpdir(), "tabula-reader-"));
  const filePath = path.join(dir, fileName);
  try {
    await writeFile(filePath, data);
  } catch (err) {
    await rm(dir, { recursive: true, force: true });
    throw err;
  }
  return {
    path: filePath,
    temporary: true,
    cleanup: () => rm(dir, { recursive: true, force: true }),
  };
}

async function download(url: URL, suffix: string, userAgent?: string): Promise<LocalFile> {
  const headers: Record<string, string> = userAgent ? { "User-Agent": userAgent } : {};
  let response: Response;
  try {
    response = await fetch(url, { headers });
  } catch (err) {
    throw new InputFileError(`Failed to download ${url.href}`, { cause: err });
  }
  if (!response.ok) {
    throw new InputFileError(`Failed to download ${url.href}: HTTP ${response.status}`);
  }

  const finalUrl = new URL(response.url || url.href);
  const remoteName = path.posix.basename(decodeURIComponent(finalUrl.pathname));
  const fileName = path.extname(remoteName) === suffix ? remoteName : `${process.pid}${suffix}`;

  const data = new Uint8Array(await response.arrayBuffer());
  return writeTemporary(fileName, data);
}
