import { describe, expect, it } from "vitest";

import { extractSignatures, findMissingSignatures, tokenize } from "../agents/signature.js";

describe("tokenize", () => {
  it("keeps multi-character operators and quoted strings whole", () => {
    expect(tokenize("f(*args, **kw) -> 'x y'")).toEqual(["f", "(", "*", "args", ",", "**", "kw", ")", "->", "'x y'"]);
  });
});

describe("extractSignatures", () => {
  it("reads a Python header up to the trailing colon", () => {
    const [signature] = extractSignatures("Implement `def add(a: int, b: int) -> int:` returning the sum.");

    expect(signature).toEqual({
      name: "add",
      text: "def add ( a : int , b : int ) -> int",
      tokens: ["add", "(", "a", ":", "int", ",", "b", ":", "int", ")", "->", "int"]
    });
  });

  it("reads a TypeScript header up to the body and drops export and async", () => {
    const source = [
      "export async function load(id: number): Promise<Map<string, number>> {",
      "function parse(input: string): Result<number>;"
    ].join("\n");

    expect(extractSignatures(source).map((signature) => signature.text)).toEqual([
      "function load ( id : number ) : Promise < Map < string , number > >",
      "function parse ( input : string ) : Result < number >"
    ]);
  });

  it("keeps headers in order of appearance without duplicates", () => {
    const source = "def b(x):\n  pass\nfunction a(y: string): void {}\ndef b(x):\n  pass";

    expect(extractSignatures(source).map((signature) => signature.name)).toEqual(["b", "a"]);
  });

  it("does not read a function header out of prose", () => {
    expect(extractSignatures("Write a function add(a, b) that returns the sum of two integers.")).toEqual([]);
  });

  it("reads a function header that starts a line inside a fenced block", () => {
    const source = "Implement this:\n```ts\n  function add(a: number, b: number): number;\n```";

    expect(extractSignatures(source)).toEqual([
      {
        name: "add",
        text: "function add ( a : number , b : number ) : number",
        tokens: ["add", "(", "a", ":", "number", ",", "b", ":", "number", ")", ":", "number"]
      }
    ]);
  });

  it("ignores a header whose parameter list never closes", () => {
    expect(extractSignatures("def broken(a, b")).toEqual([]);
  });
});

describe("findMissingSignatures", () => {
  const signatures = extractSignatures("def add(a: int, b: int) -> int: adds two numbers");

  it("accepts the same header with different whitespace", () => {
    expect(findMissingSignatures(signatures, "def add(a:int,b:int)->int:\n    return a + b")).toEqual([]);
  });

  it("reports a header whose types changed", () => {
    const missing = findMissingSignatures(signatures, "def add(a: float, b: float) -> float:\n    return a + b");

    expect(missing.map((signature) => signature.name)).toEqual(["add"]);
  });

  it("accepts a function header kept under the def keyword", () => {
    const header = extractSignatures("function add(a, b)\nreturns the sum of a and b.");

    expect(findMissingSignatures(header, "def add(a, b):\n    return a + b\n")).toEqual([]);
  });

  it("does not count a call with the same arguments as the header", () => {
    const header = extractSignatures("def add(a, b): returns the sum");

    expect(findMissingSignatures(header, "def plus(x, y):\n    return x + y\n\nprint(add(a, b))").map((s) => s.name)).toEqual([
      "add"
    ]);
  });
});
