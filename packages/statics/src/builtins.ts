import { createRequire } from "node:module";
import { Ctx, type VarEntry } from "./ctx/ctx.js";
import { decodeTypJson } from "./types/typ-json.js";

const require = createRequire(import.meta.url);
const table: unknown = require("./builtins.json");

const readEntries = (value: unknown): VarEntry[] => {
  if (typeof value !== "object" || value === null || !("values" in value)) {
    throw new Error("builtins.json: expected an object with a values array");
  }
  const { values } = value;
  if (!Array.isArray(values)) {
    throw new Error("builtins.json: expected an object with a values array");
  }
  return values.map((entry: unknown, index): VarEntry => {
    const path = `builtins.json.values[${index}]`;
    if (typeof entry !== "object" || entry === null || !("name" in entry) || !("type" in entry)) {
      throw new Error(`${path}: expected { name, type }`);
    }
    const { name } = entry;
    if (typeof name !== "string") {
      throw new Error(`${path}.name: expected a string`);
    }
    return {
      kind: "var",
      name,
      id: `builtin:${name}`,
      ty: decodeTypJson(entry.type, `${path}.type`),
    };
  });
};

/** Values every program can refer to, such as `pi` and `string_length`. */
export const builtinEntries: readonly VarEntry[] = readEntries(table);

export const builtinCtx: Ctx = Ctx.of(builtinEntries);
