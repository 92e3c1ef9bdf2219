export { defaultProtocol, JsonProtocol, toJson } from "./json.ts";
export type { JsonProtocolOptions } from "./json.ts";
export { isStatusCode, NULL_BODY_STATUSES, statusCode } from "./status.ts";
export type {
  BodyTarget,
  ClientDecoder,
  ClientEncoder,
  ClientProtocol,
  Protocol,
  ServerDecoder,
  ServerEncoder,
  ServerProtocol,
  StatusCode,
} from "./types.ts";
