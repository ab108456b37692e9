import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import type { Output } from "../commands.js";
import { run } from "../program.js";

const fixture = fileURLToPath(new URL("./fixtures/lit-sphere.pbrt", import.meta.url));

function recorder(): Output & { stdout: string[]; stderr: string[] } {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    out: (line) => stdout.push(line),
    err: (line) => stderr.push(line),
  };
}

describe("pbrtkit", () => {
  it("dumps a scene file from disk", async () => {
    const output = recorder();
    expect(await run(["dump", fixture, "--log-level", "silent"], output)).toBe(0);
    expect(output.stdout).toEqual([
      "camera: perspective",
      "film: none",
      "sampler: halton",
      "integrator: volpath",
      "shapes: 2 (disk 1, sphere 1)",
      "materials: 0",
      "textures: 0",
      "lights: 0",
      "area lights: 1",
      "media: 0",
      "objects: 0 (0 instances)",
    ]);
  });

  it("lists tokens without comments", async () => {
    const output = recorder();
    expect(await run(["tokens", fixture, "--no-comments"], output)).toBe(0);
    expect(output.stdout[0]).toBe("40\tbare\tLookAt");
  });

  it("prints its version", async () => {
    const output = recorder();
    expect(await run(["--version"], output)).toBe(0);
    expect(output.stdout).toEqual(["0.1.0"]);
  });

  it("fails on a missing argument", async () => {
    const output = recorder();
    expect(await run(["dump"], output)).toBe(1);
    expect(output.stderr).toEqual(["error: missing required argument 'file'"]);
  });

  it("fails on an unknown command", async () => {
    const output = recorder();
    expect(await run(["render", fixture], output)).toBe(1);
  });
});
