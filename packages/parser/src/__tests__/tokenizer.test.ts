import { describe, expect, it } from "vitest";
import { Tokenizer, tokenize } from "../tokenizer.js";

const texts = (source: string, skipComments = false) =>
  tokenize(source, { skipComments }).map((t) => t.text);

describe("Tokenizer", () => {
  it("splits on whitespace", () => {
    expect(tokenize("A B")).toEqual([
      { kind: "bare", text: "A", offset: 0 },
      { kind: "bare", text: "B", offset: 2 },
    ]);
  });

  it("yields nothing for empty or blank input", () => {
    expect(tokenize("")).toEqual([]);
    expect(tokenize(" \t\r\n ")).toEqual([]);
  });

  it("keeps embedded spaces inside quotes", () => {
    expect(tokenize('"foo bar"')).toEqual([{ kind: "quoted", text: '"foo bar"', offset: 0 }]);
  });

  it("runs an unterminated quote to end of input", () => {
    expect(texts('Shape "foo')).toEqual(["Shape", '"foo']);
  });

  it("emits brackets as single tokens", () => {
    expect(texts('"float radius" [1 2]')).toEqual(['"float radius"', "[", "1", "2", "]"]);
    expect(texts("[[]]")).toEqual(["[", "[", "]", "]"]);
  });

  it("ends bare words at quotes", () => {
    expect(texts('a"b"c')).toEqual(["a", '"b"', "c"]);
  });

  it("runs comments to end of line", () => {
    const source = "# a comment\r\nWorldBegin # trailing\nAttributeBegin";
    expect(texts(source)).toEqual(["# a comment", "WorldBegin", "# trailing", "AttributeBegin"]);
  });

  it("drops comments when asked", () => {
    const source = "# a comment\nWorldBegin # trailing\nAttributeBegin\n#";
    const tokens = texts(source, true);
    expect(tokens).toEqual(["WorldBegin", "AttributeBegin"]);
    expect(tokens.some((t) => t.startsWith("#"))).toBe(false);
  });

  it("drops a peeked comment when comments are switched off later", () => {
    const tokenizer = new Tokenizer("# note\nIdentity");
    expect(tokenizer.peek()?.kind).toBe("comment");
    expect(tokenizer.skipComments().next()?.text).toBe("Identity");
  });

  it("peeks without consuming", () => {
    const tokenizer = new Tokenizer("Translate 1 2 3");
    expect(tokenizer.peek()?.text).toBe("Translate");
    expect(tokenizer.offset).toBe(0);
    expect(tokenizer.next()?.text).toBe("Translate");
    expect(tokenizer.next()?.text).toBe("1");
    expect(tokenizer.offset).toBe(11);
  });

  it("is deterministic", () => {
    const source = 'Shape "sphere" "float radius" [ 2 ] # x\n';
    expect(tokenize(source)).toEqual(tokenize(source));
  });

  it("is exhausted after one pass", () => {
    const tokenizer = new Tokenizer("A B");
    expect([...tokenizer]).toHaveLength(2);
    expect([...tokenizer]).toHaveLength(0);
    expect(tokenizer.next()).toBeUndefined();
  });
});
