import { getConfigFromCli } from "./arg-parser.js";
import type { GradusConfig } from "./types.js";

let config: GradusConfig | undefined = undefined;

export const getConfig = () => {
  if (config) {
    return config;
  }
  config = getConfigFromCli();
  return config;
};
