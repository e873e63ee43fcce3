import { TermDecodeError } from "./term/decode.js";

export type JsonObject = Record<string, unknown>;

export const readObject = (value: unknown, path: string): JsonObject => {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new TermDecodeError(path, "expected an object");
  }
  return Object.fromEntries(Object.entries(value));
};

export const readString = (json: JsonObject, key: string, path: string): string => {
  const value = json[key];
  if (typeof value !== "string") {
    throw new TermDecodeError(`${path}.${key}`, "expected a string");
  }
  return value;
};

export const readArray = (json: JsonObject, key: string, path: string): unknown[] => {
  const value = json[key];
  if (!Array.isArray(value)) {
    throw new TermDecodeError(`${path}.${key}`, "expected an array");
  }
  return value;
};

export const readStrings = (json: JsonObject, key: string, path: string): string[] =>
  readArray(json, key, path).map((value, index) => {
    if (typeof value !== "string") {
      throw new TermDecodeError(`${path}.${key}[${index}]`, "expected a string");
    }
    return value;
  });
