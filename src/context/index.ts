export { createKey, ScopeKey } from "./key.js";

export {
  lookup,
  lookupMeta,
  requireValue,
  listBindings,
  type LookupResult,
  type BindingLevel,
} from "./context.js";
