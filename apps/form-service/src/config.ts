import { loadConfig, type Config } from "@formhub/config";

export type { Config };

export const config: Config = loadConfig();
