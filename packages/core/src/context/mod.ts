export { RequestContext } from "./context.ts";
