export { ConfluenceStore, storageToText } from "./confluence-store";
export type { ConfluenceStoreOptions } from "./confluence-store";
