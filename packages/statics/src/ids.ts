/**
 * Term identifiers are assigned by the editing layer. They are opaque to the
 * statics engine apart from equality, and a node may own several of them
 * (one per token of a multi-token form).
 */
export type Id = string;

export class StaticsInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StaticsInvariantError";
  }
}

export const repId = (term: { ids: readonly Id[] }): Id => {
  const id = term.ids[0];
  if (id === undefined) {
    throw new StaticsInvariantError("term node has no ids");
  }
  return id;
};
