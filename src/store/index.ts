export type { BackingStore, StoreFactory } from "./backing_store";
export { HashStore } from "./hash_store";
export { OrderedStore } from "./ordered_store";
