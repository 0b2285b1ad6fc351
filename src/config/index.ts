import { env, type Env } from "./env.js";

/** Settings every client and capability reads; fixed once the process has started. */
export type Config = Readonly<Env>;
export const config: Config = Object.freeze({ ...env });
