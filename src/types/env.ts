/** Context variables (for c.set/c.get) */
export interface Variables {
  /** Request ID */
  requestId: string;
}

/** Hono environment shared by every sub-app */
export interface AppEnv {
  Variables: Variables;
}
