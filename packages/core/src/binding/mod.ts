export {
  buildDispatcher,
  classifySignature,
  defineRoute,
} from "./adapter.ts";
export type {
  AdapterOptions,
  AnyRouteDefinition,
  Dispatcher,
  Role,
  RouteDefinition,
  SignatureDescriptor,
} from "./adapter.ts";
export {
  bodyBinder,
  contextBinder,
  pathBinder,
  requestBinder,
} from "./binders.ts";
export type { Binder, BindResult } from "./binders.ts";
export { isParamSpec, p } from "./params.ts";
export type { BoundArgs, ParamKind, ParamSpec } from "./params.ts";
export { isReply, isReturnShape, reply, RETURN_SHAPES } from "./reply.ts";
export type {
  BodyAndStatusReply,
  BodyReply,
  HandlerResult,
  NoBodyReply,
  Reply,
  ReplyFor,
  ReturnShape,
  StatusReply,
} from "./reply.ts";
export {
  ParamParseError,
  parseBigInteger,
  parseFloatKind,
  parseInteger,
} from "./scalar.ts";
export type {
  BigIntegerKind,
  FloatKind,
  IntegerKind,
  ParseFailure,
  ScalarKind,
} from "./scalar.ts";
