import { readFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { z } from "zod";
import { spawnProcess, type ProcessRunner } from "./backend.js";
import { PACKAGE_ROOT, jarPath, javaCommand, type Env } from "./config.js";

const packageJsonSchema = z.object({ version: z.string() });

export async function packageVersion(): Promise<string> {
  const raw = await readFile(path.join(PACKAGE_ROOT, "package.json"), "utf8");
  return packageJsonSchema.parse(JSON.parse(raw)).version;
}

/** Output of `java -version`, or a hint when java cannot be started. */
export async function javaVersion(
  env: Env = process.env,
  runner: ProcessRunner = spawnProcess
): Promise<string> {
  const command = javaCommand(env);
  try {
    const result = await runner(command, ["-version"]);
    // The JVM prints its version banner on stderr.
    return Buffer.concat([result.stderr, result.stdout]).toString("utf8").trim();
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return `\`${command} -version\` failed (${reason}). Please ensure Java is installed and PATH is set for \`java\`.`;
  }
}

/** Multi-line report of the runtime versions, for bug reports. */
export async function environmentInfo(
  env: Env = process.env,
  runner: ProcessRunner = spawnProcess
): Promise<string> {
  const [version, java] = await Promise.all([packageVersion(), javaVersion(env, runner)]);
  const indentedJava = java
    .split("\n")
    .map(line => `    ${line}`)
    .join("\n");

  return [
    `Node.js version: ${process.version}`,
    "Java version:",
    indentedJava,
    `tabula-reader version: ${version}`,
    `tabula-java jar: ${jarPath(env)}`,
    `platform: ${os.platform()} ${os.release()} (${os.arch()})`,
  ].join("\n");
}
