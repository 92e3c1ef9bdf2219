export { RestClient } from "./client.ts";
export type {
  FetchFn,
  HeaderValues,
  RequestOptions,
  RestClientConfig,
} from "./client.ts";
