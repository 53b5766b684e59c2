export { StateStore, SECRET_KEYS, stripSecrets } from "./state-store.js";
export type { StateStoreConfig } from "./state-store.js";
export { EngineStateSchema, TrackedOrderSchema, AmbiguousPlacementSchema } from "./state-schema.js";
export type { EngineState, StoredAmbiguousPlacement, StoredOrder } from "./state-schema.js";
