import { loadConfig, type Config } from "@notify-relay/config";

export const config = loadConfig();
export type { Config };
