export { handleStatusRequest } from "./routes.js";
export type { StatusRouteDeps } from "./routes.js";
