/**
 * Pipeline modules export
 */

export { createContext, authorize } from "./session";
export { readLabels } from "./reader";
export { fetchByLabels } from "./labels";
export { fetchByQuery } from "./query";
export { stats } from "./stats";
