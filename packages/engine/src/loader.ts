import * as fs from "node:fs";
import * as path from "node:path";
import type { Scene } from "@pbrtkit/ir";
import { isParseError, ParseError, Parser, type Directive } from "@pbrtkit/parser";
import { SceneBuilder } from "./builder.js";
import { logger as defaultLogger, type Logger } from "./logger.js";

export type ReadFile = (filePath: string) => string;

export interface LoadOptions {
  /** Directory that relative `Include` paths resolve against. */
  baseDir?: string;
  /** Name reported in error locations for the top-level buffer. */
  file?: string;
  logger?: Logger;
  readFile?: ReadFile;
}

const readFileUtf8: ReadFile = (filePath) => fs.readFileSync(filePath, "utf8");

/** Read a scene buffer; failures become `Io` errors. */
export function readSceneSource(filePath: string, readFile: ReadFile = readFileUtf8): string {
  try {
    return readFile(filePath);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ParseError("Io", `Unable to read '${filePath}': ${reason}`, { cause: err });
  }
}

function rejectCompressed(filePath: string): void {
  if (filePath.endsWith(".gz")) {
    throw new ParseError("Unsupported", `Compressed scene file '${filePath}' is not supported`);
  }
}

/**
 * Load a scene from an in-memory buffer.
 *
 * Includes are opened on an explicit stack of parsers; the innermost file is
 * read to the end before its includer resumes. Relative include paths always
 * resolve against `baseDir`, however deep the nesting.
 */
export function loadScene(source: string, options: LoadOptions = {}): Scene {
  const baseDir = path.resolve(options.baseDir ?? process.cwd());
  const logger = options.logger ?? defaultLogger;
  const readFile = options.readFile ?? readFileUtf8;

  const builder = new SceneBuilder({ logger });
  const top = new Parser(source, { file: options.file });
  const frames: Parser[] = [top];

  while (frames.length > 0) {
    const parser = frames[frames.length - 1];

    let directive: Directive;
    try {
      directive = parser.parseNext();
    } catch (err) {
      if (isParseError(err, "EndOfFile")) {
        frames.pop();
        continue;
      }
      throw err;
    }

    try {
      if (directive.type === "Include") {
        frames.push(openInclude(directive.path, frames, baseDir, readFile, logger));
      } else {
        builder.apply(directive);
      }
    } catch (err) {
      if (err instanceof ParseError) {
        err.offset ??= directive.offset;
        err.locate(parser.source, parser.file);
      }
      throw err;
    }
  }

  let scene: Scene;
  try {
    scene = builder.finish();
  } catch (err) {
    if (err instanceof ParseError) err.locate(source, options.file);
    throw err;
  }

  logger.info(
    "loader",
    `Loaded ${options.file ?? "scene"}: ${scene.shapes.length} shapes, ` +
      `${scene.materials.length} materials, ${scene.lights.length} lights`,
  );
  return scene;
}

function openInclude(
  includePath: string,
  frames: readonly Parser[],
  baseDir: string,
  readFile: ReadFile,
  logger: Logger,
): Parser {
  const resolved = path.resolve(baseDir, includePath);
  rejectCompressed(resolved);
  if (frames.some((frame) => frame.file === resolved)) {
    throw new ParseError("Unsupported", `Recursive include of '${resolved}'`);
  }
  logger.debug("loader", `Including ${resolved} (depth ${frames.length})`);
  return new Parser(readSceneSource(resolved, readFile), { file: resolved });
}

/** Load a scene file; includes resolve against the file's directory. */
export function loadSceneFile(filePath: string, options: LoadOptions = {}): Scene {
  const resolved = path.resolve(filePath);
  rejectCompressed(resolved);
  const source = readSceneSource(resolved, options.readFile);
  return loadScene(source, {
    ...options,
    baseDir: options.baseDir ?? path.dirname(resolved),
    file: options.file ?? resolved,
  });
}
