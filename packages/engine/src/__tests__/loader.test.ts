import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import type { ShapeEntity } from "@pbrtkit/ir";
import { loadSceneFile, type ReadFile } from "../loader.js";
import { createLogger, type LogEntry } from "../logger.js";
import { load, loadError, parseErrorOf, quiet } from "./helpers.js";

const fixtures = fileURLToPath(new URL("./fixtures/", import.meta.url));

function memoryFiles(files: Record<string, string>): ReadFile {
  return (filePath) => {
    const text = files[filePath];
    if (text === undefined) throw new Error(`ENOENT: ${filePath}`);
    return text;
  };
}

const radii = (shapes: ShapeEntity[]) =>
  shapes.map((s) => (s.params.type === "sphere" ? s.params.radius : undefined));

describe("loadSceneFile", () => {
  it("follows nested includes relative to the top-level file", () => {
    const scene = loadSceneFile(path.join(fixtures, "main.pbrt"), { logger: quiet });
    expect(radii(scene.shapes)).toEqual([1, 2, 3, 4, 5]);
    expect(scene.camera?.params).toMatchObject({ type: "perspective", fov: 45 });
  });

  it("wraps read failures as Io errors", () => {
    const err = parseErrorOf(() =>
      loadSceneFile(path.join(fixtures, "absent.pbrt"), { logger: quiet }),
    );
    expect(err.kind).toBe("Io");
    expect(err.category).toBe("io");
    expect(err.cause).toBeInstanceOf(Error);
  });

  it("rejects compressed files", () => {
    expect(parseErrorOf(() => loadSceneFile("scene.pbrt.gz")).kind).toBe("Unsupported");
  });
});

describe("loadScene includes", () => {
  const readFile = memoryFiles({
    "/scenes/a.pbrt": 'Shape "sphere" "float radius" 1\nInclude "nested/b.pbrt"',
    "/scenes/nested/b.pbrt": 'Shape "sphere" "float radius" 2',
    "/scenes/bad.pbrt": 'Shape "sphere"\n"float radius" [ 1 oops ]',
    "/scenes/loop.pbrt": 'Include "loop.pbrt"',
    "/scenes/open.pbrt": "AttributeBegin",
  });
  const options = { baseDir: "/scenes", readFile };

  it("resumes the including buffer after an include", () => {
    const scene = load(
      'WorldBegin\nInclude "a.pbrt"\nShape "sphere" "float radius" 3',
      options,
    );
    expect(radii(scene.shapes)).toEqual([1, 2, 3]);
  });

  it("carries graphics state across files", () => {
    const scene = load('WorldBegin\nInclude "open.pbrt"\nTranslate 1 0 0\nAttributeEnd', options);
    expect(scene.shapes).toEqual([]);
    expect(loadError('WorldBegin\nInclude "open.pbrt"', options).kind).toBe(
      "UnbalancedAttributes",
    );
  });

  it("locates errors in the included file", () => {
    const err = loadError('WorldBegin\nInclude "bad.pbrt"', options);
    expect(err.kind).toBe("ParseFloat");
    expect(err.location).toEqual({ file: "/scenes/bad.pbrt", line: 2, column: 20 });
  });

  it("locates a missing include at the Include directive", () => {
    const err = loadError('WorldBegin\nInclude "missing.pbrt"', options);
    expect(err.kind).toBe("Io");
    expect(err.message).toBe(
      "2:1: Unable to read '/scenes/missing.pbrt': ENOENT: /scenes/missing.pbrt",
    );
  });

  it("rejects compressed and recursive includes", () => {
    expect(loadError('WorldBegin\nInclude "geo.pbrt.gz"', options).kind).toBe("Unsupported");
    expect(loadError('WorldBegin\nInclude "loop.pbrt"', options).kind).toBe("Unsupported");
  });

  it("logs each include and the completed load", () => {
    const logger = createLogger({ level: "SILENT" });
    const entries: LogEntry[] = [];
    logger.subscribe((entry) => entries.push(entry));

    load('WorldBegin\nInclude "a.pbrt"', { ...options, logger });
    expect(entries.map((e) => `${e.level} ${e.source} ${e.message}`)).toEqual([
      "DEBUG loader Including /scenes/a.pbrt (depth 1)",
      "DEBUG loader Including /scenes/nested/b.pbrt (depth 2)",
      "INFO loader Loaded scene: 2 shapes, 0 materials, 0 lights",
    ]);
  });
});
