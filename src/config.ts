import path from "node:path";
import { fileURLToPath } from "node:url";

export const TABULA_JAVA_VERSION = "1.0.5";
export const JAR_NAME = `tabula-${TABULA_JAVA_VERSION}-jar-with-dependencies.jar`;

const moduleParent = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..");
// src/ sits at the package root, the compiled dist/src/ one level deeper
export const PACKAGE_ROOT =
  path.basename(moduleParent) === "dist" ? path.dirname(moduleParent) : moduleParent;
const DEFAULT_JAR_PATH = path.join(PACKAGE_ROOT, "vendor", JAR_NAME);

export type Env = Record<string, string | undefined>;

export interface EngineConfig {
  jarPath: string;
  javaCommand: string;
}

export function jarPath(env: Env = process.env): string {
  return env.TABULA_JAR || DEFAULT_JAR_PATH;
}

export function javaCommand(env: Env = process.env): string {
  if (env.TABULA_JAVA) return env.TABULA_JAVA;
  if (env.JAVA_HOME) {
    const exe = process.platform === "win32" ? "java.exe" : "java";
    return path.join(env.JAVA_HOME, "bin", exe);
  }
  return "java";
}

export function resolveEngineConfig(env: Env = process.env): EngineConfig {
  return { jarPath: jarPath(env), javaCommand: javaCommand(env) };
}
