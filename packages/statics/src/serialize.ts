import { decode, encode } from "@msgpack/msgpack";
import type { CoCtxEntry } from "./ctx/co-ctx.js";
import { Ctx, type CtxEntry } from "./ctx/ctx.js";
import { repId, type Id } from "./ids.js";
import {
  readArray,
  readObject,
  readString,
  readStrings,
  type JsonObject,
} from "./json.js";
import { distinctInfos } from "./queries.js";
import type { Info, InfoMap } from "./statics/info.js";
import type { Mode } from "./statics/mode.js";
import type { FreeKind, Self, Source } from "./statics/self.js";
import type { Ok, StaticsError, Status, TermStatus } from "./statics/status.js";
import { TermDecodeError } from "./term/decode.js";
import { decodeTypJson } from "./types/typ-json.js";
import type { Typ } from "./types/typ.js";

export interface ExportedUses {
  name: string;
  uses: CoCtxEntry[];
}

interface ExportedInfoBase {
  /** Every id of the node; the first is the representative one. */
  ids: Id[];
  cls: string;
  ancestors: Id[];
  /** Bindings in scope, innermost first, excluding the base context. */
  ctx: CtxEntry[];
}

export type ExportedInfo =
  | (ExportedInfoBase & { kind: "invalid"; text: string })
  | (ExportedInfoBase & {
      kind: "exp" | "pat";
      mode: Mode;
      self: Self;
      status: Status;
      ty: Typ;
      coCtx: ExportedUses[];
    })
  | (ExportedInfoBase & { kind: "typ"; status: TermStatus; ty: Typ })
  | (ExportedInfoBase & { kind: "rule" })
  | (ExportedInfoBase & { kind: "tpat" | "variant"; status: TermStatus });

export interface ExportedInfoMap {
  version: 1;
  /** One entry per node, keyed by representative id, in id order. */
  infos: Record<Id, ExportedInfo>;
}

export interface ExportOptions {
  /** Context every program starts from; its entries are left out. */
  base?: Ctx;
}

const exportInfo = (info: Info, base: Ctx): ExportedInfo => {
  const common: ExportedInfoBase = {
    ids: [...info.term.ids],
    cls: info.cls,
    ancestors: [...info.ancestors],
    ctx: info.ctx.addedSince(base),
  };
  switch (info.kind) {
    case "invalid":
      return { ...common, kind: "invalid", text: info.term.text };
    case "exp":
    case "pat":
      return {
        ...common,
        kind: info.kind,
        mode: info.mode,
        self: info.self,
        status: info.status,
        ty: info.ty,
        coCtx: Array.from(info.coCtx, ([name, uses]) => ({ name, uses: [...uses] })),
      };
    case "typ":
      return { ...common, kind: "typ", status: info.status, ty: info.ty };
    case "rule":
      return { ...common, kind: "rule" };
    case "tpat":
    case "variant":
      return { ...common, kind: info.kind, status: info.status };
  }
};

/** A plain-data copy of `map`, independent of traversal order. */
export const exportInfoMap = (
  map: InfoMap,
  { base = Ctx.empty }: ExportOptions = {}
): ExportedInfoMap => {
  const infos = distinctInfos(map).sort((a, b) => {
    const left = repId(a.term);
    const right = repId(b.term);
    return left < right ? -1 : left > right ? 1 : 0;
  });
  return {
    version: 1,
    infos: Object.fromEntries(infos.map((info) => [repId(info.term), exportInfo(info, base)])),
  };
};

export const encodeInfoMap = (map: InfoMap, options?: ExportOptions): Uint8Array =>
  encode(exportInfoMap(map, options), { ignoreUndefined: true });

/* Decoding */

const fail = (path: string, message: string): never => {
  throw new TermDecodeError(path, message);
};

const readTyp = (json: JsonObject, key: string, path: string): Typ =>
  decodeTypJson(json[key], `${path}.${key}`);

const decodeMode = (value: unknown, path: string): Mode => {
  const json = readObject(value, path);
  const kind = readString(json, "kind", path);
  switch (kind) {
    case "syn":
    case "syn-fun":
      return { kind };
    case "ana":
      return { kind, ty: readTyp(json, "ty", path) };
    default:
      return fail(`${path}.kind`, `unknown mode "${kind}"`);
  }
};

const decodeSources = (json: JsonObject, path: string): Source[] =>
  readArray(json, "sources", path).map((value, index) => {
    const source = readObject(value, `${path}.sources[${index}]`);
    return {
      id: readString(source, "id", `${path}.sources[${index}]`),
      ty: readTyp(source, "ty", `${path}.sources[${index}]`),
    };
  });

const isFreeKind = (value: string): value is FreeKind =>
  value === "variable" || value === "tag" || value === "type-variable";

const decodeSelf = (value: unknown, path: string): Self => {
  const json = readObject(value, path);
  const kind = readString(json, "kind", path);
  switch (kind) {
    case "just":
      return { kind, ty: readTyp(json, "ty", path) };
    case "joined": {
      const wrap = readString(json, "wrap", path);
      if (wrap !== "none" && wrap !== "list") {
        return fail(`${path}.wrap`, `unknown wrap "${wrap}"`);
      }
      return { kind, wrap, sources: decodeSources(json, path) };
    }
    case "multi":
      return { kind };
    case "free": {
      const free = readString(json, "free", path);
      if (!isFreeKind(free)) {
        return fail(`${path}.free`, `unknown free kind "${free}"`);
      }
      return { kind, free, name: readString(json, "name", path) };
    }
    default:
      return fail(`${path}.kind`, `unknown self "${kind}"`);
  }
};

const decodeOk = (value: unknown, path: string): Ok => {
  const json = readObject(value, path);
  const kind = readString(json, "kind", path);
  switch (kind) {
    case "syn":
      return { kind, ty: readTyp(json, "ty", path) };
    case "ana-consistent":
      return {
        kind,
        ana: readTyp(json, "ana", path),
        syn: readTyp(json, "syn", path),
        join: readTyp(json, "join", path),
      };
    case "ana-external-inconsistent":
      return { kind, ana: readTyp(json, "ana", path), syn: readTyp(json, "syn", path) };
    case "ana-internal-inconsistent":
      return { kind, ana: readTyp(json, "ana", path), sources: decodeSources(json, path) };
    default:
      return fail(`${path}.kind`, `unknown status "${kind}"`);
  }
};

const decodeError = (value: unknown, path: string): StaticsError => {
  const json = readObject(value, path);
  const kind = readString(json, "kind", path);
  switch (kind) {
    case "free": {
      const free = readString(json, "free", path);
      if (!isFreeKind(free)) {
        return fail(`${path}.free`, `unknown free kind "${free}"`);
      }
      return { kind, free, name: readString(json, "name", path) };
    }
    case "syn-inconsistent-branches":
      return { kind, sources: decodeSources(json, path) };
    case "type-inconsistent":
      return { kind, syn: readTyp(json, "syn", path), ana: readTyp(json, "ana", path) };
    case "inconsistent-with-arrow":
      return { kind, ty: readTyp(json, "ty", path) };
    case "duplicate-tag":
      return { kind, tag: readString(json, "tag", path) };
    case "shadows-base-type":
      return { kind, name: readString(json, "name", path) };
    case "bad-sum-entry":
    case "not-a-name":
      return { kind };
    default:
      return fail(`${path}.kind`, `unknown error "${kind}"`);
  }
};

const decodeStatus = (value: unknown, path: string): Status => {
  const json = readObject(value, path);
  return readString(json, "kind", path) === "in-hole"
    ? { kind: "in-hole", error: decodeError(json.error, `${path}.error`) }
    : { kind: "not-in-hole", ok: decodeOk(json.ok, `${path}.ok`) };
};

const decodeTermStatus = (value: unknown, path: string): TermStatus => {
  const json = readObject(value, path);
  return readString(json, "kind", path) === "in-hole"
    ? { kind: "in-hole", error: decodeError(json.error, `${path}.error`) }
    : { kind: "not-in-hole" };
};

const decodeCtxEntry = (value: unknown, path: string): CtxEntry => {
  const json = readObject(value, path);
  const kind = readString(json, "kind", path);
  const id = readString(json, "id", path);
  switch (kind) {
    case "var":
      return { kind, id, name: readString(json, "name", path), ty: readTyp(json, "ty", path) };
    case "constructor":
      return { kind, id, tag: readString(json, "tag", path), ty: readTyp(json, "ty", path) };
    case "tvar": {
      const tvarKind = readObject(json.tvarKind, `${path}.tvarKind`);
      return {
        kind,
        id,
        name: readString(json, "name", path),
        tvarKind:
          readString(tvarKind, "kind", `${path}.tvarKind`) === "singleton"
            ? { kind: "singleton", ty: readTyp(tvarKind, "ty", `${path}.tvarKind`) }
            : { kind: "abstract" },
      };
    }
    default:
      return fail(`${path}.kind`, `unknown context entry "${kind}"`);
  }
};

const decodeUses = (value: unknown, path: string): ExportedUses => {
  const json = readObject(value, path);
  return {
    name: readString(json, "name", path),
    uses: readArray(json, "uses", path).map((use, index) => {
      const entry = readObject(use, `${path}.uses[${index}]`);
      return {
        id: readString(entry, "id", `${path}.uses[${index}]`),
        mode: decodeMode(entry.mode, `${path}.uses[${index}].mode`),
      };
    }),
  };
};

const decodeExportedInfo = (value: unknown, path: string): ExportedInfo => {
  const json = readObject(value, path);
  const common: ExportedInfoBase = {
    ids: readStrings(json, "ids", path),
    cls: readString(json, "cls", path),
    ancestors: readStrings(json, "ancestors", path),
    ctx: readArray(json, "ctx", path).map((entry, index) =>
      decodeCtxEntry(entry, `${path}.ctx[${index}]`)
    ),
  };
  const kind = readString(json, "kind", path);
  switch (kind) {
    case "invalid":
      return { ...common, kind, text: readString(json, "text", path) };
    case "exp":
    case "pat":
      return {
        ...common,
        kind,
        mode: decodeMode(json.mode, `${path}.mode`),
        self: decodeSelf(json.self, `${path}.self`),
        status: decodeStatus(json.status, `${path}.status`),
        ty: readTyp(json, "ty", path),
        coCtx: readArray(json, "coCtx", path).map((uses, index) =>
          decodeUses(uses, `${path}.coCtx[${index}]`)
        ),
      };
    case "typ":
      return {
        ...common,
        kind,
        status: decodeTermStatus(json.status, `${path}.status`),
        ty: readTyp(json, "ty", path),
      };
    case "rule":
      return { ...common, kind };
    case "tpat":
    case "variant":
      return { ...common, kind, status: decodeTermStatus(json.status, `${path}.status`) };
    default:
      return fail(`${path}.kind`, `unknown info kind "${kind}"`);
  }
};

/** Reads bytes written by {@link encodeInfoMap}. */
export const decodeExportedInfoMap = (bytes: Uint8Array): ExportedInfoMap => {
  const json = readObject(decode(bytes), "$");
  if (json.version !== 1) {
    return fail("$.version", "unsupported version");
  }
  const infos = readObject(json.infos, "$.infos");
  return {
    version: 1,
    infos: Object.fromEntries(
      Object.entries(infos).map(([id, info]) => [id, decodeExportedInfo(info, `$.infos.${id}`)])
    ),
  };
};
