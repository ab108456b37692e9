import * as path from "node:path";
import { toJson, type Scene } from "@pbrtkit/ir";
import { isParseError, tokenize } from "@pbrtkit/parser";
import {
  createLogger,
  loadSceneFile,
  parseLogLevel,
  readSceneSource,
  type LogSink,
  type ReadFile,
} from "@pbrtkit/engine";

/** Line-oriented output; the binary binds it to the console. */
export interface Output {
  out(line: string): void;
  err(line: string): void;
}

export const consoleOutput: Output = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export interface DumpOptions {
  json?: boolean;
  logLevel?: string;
  readFile?: ReadFile;
}

export interface TokensOptions {
  skipComments?: boolean;
  readFile?: ReadFile;
}

/** Log lines go to stderr so they never mix with a JSON dump. */
function stderrSink(output: Output): LogSink {
  const write = (message: string) => output.err(message);
  return { debug: write, info: write, warn: write, error: write };
}

function reportError(err: unknown, output: Output): number {
  if (!isParseError(err)) throw err;
  output.err(`error: ${err.message}`);
  return 1;
}

function countByType(items: readonly { params: { type: string } }[]): string {
  const counts = new Map<string, number>();
  for (const item of items) {
    counts.set(item.params.type, (counts.get(item.params.type) ?? 0) + 1);
  }
  return [...counts.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([type, count]) => `${type} ${count}`)
    .join(", ");
}

function withCounts(label: string, items: readonly { params: { type: string } }[]): string {
  return items.length === 0
    ? `${label}: 0`
    : `${label}: ${items.length} (${countByType(items)})`;
}

/** Human-readable overview of a loaded scene, one fact per line. */
export function describeScene(scene: Scene): string[] {
  const { film } = scene;
  return [
    `camera: ${scene.camera?.params.type ?? "none"}`,
    `film: ${film ? `${film.type} ${film.xResolution}x${film.yResolution}` : "none"}`,
    `sampler: ${scene.sampler?.type ?? "none"}`,
    `integrator: ${scene.integrator?.type ?? "none"}`,
    withCounts("shapes", scene.shapes),
    withCounts("materials", scene.materials),
    `textures: ${scene.textures.length}`,
    withCounts("lights", scene.lights),
    `area lights: ${scene.areaLights.length}`,
    `media: ${scene.mediums.length}`,
    `objects: ${scene.objects.length} (${scene.instances.length} instances)`,
  ];
}

/** `dump`: load a scene and print its summary, or the whole scene as JSON. */
export function runDump(file: string, options: DumpOptions, output: Output): number {
  const level = options.logLevel === undefined ? undefined : parseLogLevel(options.logLevel);
  if (options.logLevel !== undefined && level === undefined) {
    output.err(`error: Unknown log level '${options.logLevel}'`);
    return 1;
  }
  const logger = createLogger({ level, sink: stderrSink(output) });

  try {
    const scene = loadSceneFile(file, { logger, readFile: options.readFile });
    if (options.json) {
      output.out(toJson(scene));
    } else {
      for (const line of describeScene(scene)) output.out(line);
    }
    return 0;
  } catch (err) {
    return reportError(err, output);
  }
}

/** `tokens`: print every token as `offset kind text`. */
export function runTokens(file: string, options: TokensOptions, output: Output): number {
  try {
    const source = readSceneSource(path.resolve(file), options.readFile);
    for (const token of tokenize(source, { skipComments: options.skipComments })) {
      output.out(`${token.offset}\t${token.kind}\t${token.text}`);
    }
    return 0;
  } catch (err) {
    return reportError(err, output);
  }
}
