export type GradusConfig = {
  /** JSON file holding the term to check. */
  index: string;
  /** Write the info map as JSON to stdout. */
  emitInfo?: boolean;
  /** Write the info map as msgpack to stdout. */
  emitMsgpack?: boolean;
  /** Report unused bindings. */
  warnings: boolean;
  color: boolean;
};
