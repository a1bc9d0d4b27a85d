export {
  createExpressHttpContext,
  toExpressMiddleware,
  type SessionDbExpressAdapterOptions,
  type SessionDbExpressHandler,
  type SessionDbExpressNext,
  type SessionDbExpressRequest,
  type SessionDbExpressResponse,
} from "./ExpressAdapter";
