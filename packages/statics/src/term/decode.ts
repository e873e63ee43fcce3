import type { Id } from "../ids.js";
import type {
  AnyTerm,
  BinOp,
  Exp,
  Pat,
  Rule,
  TPat,
  TypTerm,
  UnOp,
  VariantTerm,
} from "./nodes.js";

const BIN_OPS: ReadonlySet<string> = new Set<BinOp>([
  "+", "-", "*", "/", "**", "<", ">", "<=", ">=", "==", "!=",
  "+.", "-.", "*.", "/.", "**.", "<.", ">.", "<=.", ">=.", "==.", "!=.",
  "&&", "||", "++", "$==",
]);

const UN_OPS: ReadonlySet<string> = new Set<UnOp>(["-", "-.", "!"]);

export class TermDecodeError extends Error {
  readonly path: string;

  constructor(path: string, message: string) {
    super(`${path}: ${message}`);
    this.name = "TermDecodeError";
    this.path = path;
  }
}

type Json = Record<string, unknown>;

const isRecord = (value: unknown): value is Json =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isBinOp = (value: string): value is BinOp => BIN_OPS.has(value);
const isUnOp = (value: string): value is UnOp => UN_OPS.has(value);

/** Cursor over one JSON object, reporting failures with their path. */
class Node {
  readonly path: string;
  readonly value: Json;

  constructor(path: string, value: unknown) {
    if (!isRecord(value)) {
      throw new TermDecodeError(path, "expected an object");
    }
    this.path = path;
    this.value = value;
  }

  get kind(): string {
    return this.string("kind");
  }

  ids(): Id[] {
    const ids = this.value.ids;
    if (!Array.isArray(ids) || ids.length === 0) {
      throw new TermDecodeError(`${this.path}.ids`, "expected a non-empty array");
    }
    return ids.map((id, index) => {
      if (typeof id !== "string") {
        throw new TermDecodeError(`${this.path}.ids[${index}]`, "expected a string");
      }
      return id;
    });
  }

  string(key: string): string {
    const value = this.value[key];
    if (typeof value !== "string") {
      throw new TermDecodeError(`${this.path}.${key}`, "expected a string");
    }
    return value;
  }

  number(key: string): number {
    const value = this.value[key];
    if (typeof value !== "number") {
      throw new TermDecodeError(`${this.path}.${key}`, "expected a number");
    }
    return value;
  }

  boolean(key: string): boolean {
    const value = this.value[key];
    if (typeof value !== "boolean") {
      throw new TermDecodeError(`${this.path}.${key}`, "expected a boolean");
    }
    return value;
  }

  child<T>(key: string, decode: (value: unknown, path: string) => T): T {
    return decode(this.value[key], `${this.path}.${key}`);
  }

  optionalChild<T>(
    key: string,
    decode: (value: unknown, path: string) => T
  ): T | undefined {
    const value = this.value[key];
    return value === undefined ? undefined : decode(value, `${this.path}.${key}`);
  }

  list<T>(key: string, decode: (value: unknown, path: string) => T): T[] {
    const value = this.value[key];
    if (!Array.isArray(value)) {
      throw new TermDecodeError(`${this.path}.${key}`, "expected an array");
    }
    return value.map((entry, index) => decode(entry, `${this.path}.${key}[${index}]`));
  }

  unknownKind(sort: string): never {
    throw new TermDecodeError(`${this.path}.kind`, `unknown ${sort} kind "${this.kind}"`);
  }
}

export const decodeExp = (value: unknown, path = "$"): Exp => {
  const node = new Node(path, value);
  const ids = node.ids();

  switch (node.kind) {
    case "invalid":
      return { kind: "invalid", ids, text: node.string("text") };
    case "empty-hole":
      return { kind: "empty-hole", ids };
    case "multi-hole":
      return { kind: "multi-hole", ids, children: node.list("children", decodeAny) };
    case "unit":
      return { kind: "unit", ids };
    case "bool":
      return { kind: "bool", ids, value: node.boolean("value") };
    case "int":
      return { kind: "int", ids, value: node.number("value") };
    case "float":
      return { kind: "float", ids, value: node.number("value") };
    case "string":
      return { kind: "string", ids, value: node.string("value") };
    case "list-lit":
      return { kind: "list-lit", ids, elements: node.list("elements", decodeExp) };
    case "constructor":
      return { kind: "constructor", ids, tag: node.string("tag") };
    case "fun":
      return {
        kind: "fun",
        ids,
        pat: node.child("pat", decodePat),
        body: node.child("body", decodeExp),
      };
    case "tuple":
      return { kind: "tuple", ids, elements: node.list("elements", decodeExp) };
    case "var":
      return { kind: "var", ids, name: node.string("name") };
    case "let":
      return {
        kind: "let",
        ids,
        pat: node.child("pat", decodePat),
        def: node.child("def", decodeExp),
        body: node.child("body", decodeExp),
      };
    case "type-alias":
      return {
        kind: "type-alias",
        ids,
        tpat: node.child("tpat", decodeTPat),
        def: node.child("def", decodeTyp),
        body: node.child("body", decodeExp),
      };
    case "ap":
      return {
        kind: "ap",
        ids,
        fn: node.child("fn", decodeExp),
        arg: node.child("arg", decodeExp),
      };
    case "if":
      return {
        kind: "if",
        ids,
        cond: node.child("cond", decodeExp),
        then: node.child("then", decodeExp),
        else: node.child("else", decodeExp),
      };
    case "seq":
      return {
        kind: "seq",
        ids,
        first: node.child("first", decodeExp),
        second: node.child("second", decodeExp),
      };
    case "test":
      return { kind: "test", ids, body: node.child("body", decodeExp) };
    case "parens":
      return { kind: "parens", ids, body: node.child("body", decodeExp) };
    case "cons":
      return {
        kind: "cons",
        ids,
        head: node.child("head", decodeExp),
        tail: node.child("tail", decodeExp),
      };
    case "list-concat":
      return {
        kind: "list-concat",
        ids,
        left: node.child("left", decodeExp),
        right: node.child("right", decodeExp),
      };
    case "un-op": {
      const op = node.string("op");
      if (!isUnOp(op)) {
        throw new TermDecodeError(`${path}.op`, `unknown unary operator "${op}"`);
      }
      return { kind: "un-op", ids, op, operand: node.child("operand", decodeExp) };
    }
    case "bin-op": {
      const op = node.string("op");
      if (!isBinOp(op)) {
        throw new TermDecodeError(`${path}.op`, `unknown binary operator "${op}"`);
      }
      return {
        kind: "bin-op",
        ids,
        op,
        left: node.child("left", decodeExp),
        right: node.child("right", decodeExp),
      };
    }
    case "match":
      return {
        kind: "match",
        ids,
        scrutinee: node.child("scrutinee", decodeExp),
        rules: node.list("rules", decodeRule),
      };
    default:
      return node.unknownKind("expression");
  }
};

export const decodeRule = (value: unknown, path = "$"): Rule => {
  const node = new Node(path, value);
  if (node.kind !== "rule") {
    return node.unknownKind("rule");
  }
  return {
    kind: "rule",
    ids: node.ids(),
    pat: node.child("pat", decodePat),
    body: node.child("body", decodeExp),
  };
};

export const decodePat = (value: unknown, path = "$"): Pat => {
  const node = new Node(path, value);
  const ids = node.ids();

  switch (node.kind) {
    case "invalid":
      return { kind: "invalid", ids, text: node.string("text") };
    case "empty-hole":
      return { kind: "empty-hole", ids };
    case "multi-hole":
      return { kind: "multi-hole", ids, children: node.list("children", decodeAny) };
    case "wild":
      return { kind: "wild", ids };
    case "int":
      return { kind: "int", ids, value: node.number("value") };
    case "float":
      return { kind: "float", ids, value: node.number("value") };
    case "bool":
      return { kind: "bool", ids, value: node.boolean("value") };
    case "string":
      return { kind: "string", ids, value: node.string("value") };
    case "unit":
      return { kind: "unit", ids };
    case "list-lit":
      return { kind: "list-lit", ids, elements: node.list("elements", decodePat) };
    case "constructor":
      return { kind: "constructor", ids, tag: node.string("tag") };
    case "cons":
      return {
        kind: "cons",
        ids,
        head: node.child("head", decodePat),
        tail: node.child("tail", decodePat),
      };
    case "var":
      return { kind: "var", ids, name: node.string("name") };
    case "tuple":
      return { kind: "tuple", ids, elements: node.list("elements", decodePat) };
    case "parens":
      return { kind: "parens", ids, body: node.child("body", decodePat) };
    case "ap":
      return {
        kind: "ap",
        ids,
        fn: node.child("fn", decodePat),
        arg: node.child("arg", decodePat),
      };
    case "type-ann":
      return {
        kind: "type-ann",
        ids,
        pat: node.child("pat", decodePat),
        typ: node.child("typ", decodeTyp),
      };
    default:
      return node.unknownKind("pattern");
  }
};

export const decodeTyp = (value: unknown, path = "$"): TypTerm => {
  const node = new Node(path, value);
  const ids = node.ids();
  const kind = node.kind;

  switch (kind) {
    case "invalid":
      return { kind: "invalid", ids, text: node.string("text") };
    case "empty-hole":
      return { kind: "empty-hole", ids };
    case "multi-hole":
      return { kind: "multi-hole", ids, children: node.list("children", decodeAny) };
    case "int":
    case "float":
    case "bool":
    case "string":
    case "unit":
      return { kind, ids };
    case "list":
      return { kind: "list", ids, elem: node.child("elem", decodeTyp) };
    case "var":
      return { kind: "var", ids, name: node.string("name") };
    case "arrow":
      return {
        kind: "arrow",
        ids,
        input: node.child("input", decodeTyp),
        output: node.child("output", decodeTyp),
      };
    case "tuple":
      return { kind: "tuple", ids, elements: node.list("elements", decodeTyp) };
    case "parens":
      return { kind: "parens", ids, body: node.child("body", decodeTyp) };
    case "sum":
      return { kind: "sum", ids, variants: node.list("variants", decodeVariant) };
    default:
      return node.unknownKind("type");
  }
};

export const decodeVariant = (value: unknown, path = "$"): VariantTerm => {
  const node = new Node(path, value);
  const ids = node.ids();

  switch (node.kind) {
    case "variant": {
      const tag = node.string("tag");
      const arg = node.optionalChild("arg", decodeTyp);
      return arg ? { kind: "variant", ids, tag, arg } : { kind: "variant", ids, tag };
    }
    case "bad-entry":
      return { kind: "bad-entry", ids, typ: node.child("typ", decodeTyp) };
    default:
      return node.unknownKind("variant");
  }
};

export const decodeTPat = (value: unknown, path = "$"): TPat => {
  const node = new Node(path, value);
  const ids = node.ids();

  switch (node.kind) {
    case "invalid":
      return { kind: "invalid", ids, text: node.string("text") };
    case "empty-hole":
      return { kind: "empty-hole", ids };
    case "multi-hole":
      return { kind: "multi-hole", ids, children: node.list("children", decodeAny) };
    case "var":
      return { kind: "var", ids, name: node.string("name") };
    default:
      return node.unknownKind("type pattern");
  }
};

export const decodeAny = (value: unknown, path = "$"): AnyTerm => {
  const node = new Node(path, value);
  const sort = node.string("sort");

  switch (sort) {
    case "exp":
      return { sort, term: node.child("term", decodeExp) };
    case "pat":
      return { sort, term: node.child("term", decodePat) };
    case "typ":
      return { sort, term: node.child("term", decodeTyp) };
    case "tpat":
      return { sort, term: node.child("term", decodeTPat) };
    case "rule":
      return { sort, term: node.child("term", decodeRule) };
    case "token":
      return { sort, ids: node.ids(), text: node.string("text") };
    default:
      throw new TermDecodeError(`${path}.sort`, `unknown sort "${sort}"`);
  }
};
