export {
  createHonoHttpContext,
  SESSIONDB_HONO_STATE_KEY,
  toHonoMiddleware,
  type SessionDbHonoAdapterOptions,
  type SessionDbHonoEnv,
} from "./HonoAdapter";
