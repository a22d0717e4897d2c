export {
  MANIFEST_FILE_NAME,
  loadOrSeed,
  manifestPathFor,
  parseManifest,
  readManifest,
  seedManifest
} from "./manifest/load.js";
export type { LoadOrSeedOptions } from "./manifest/load.js";
export { renderManifest } from "./manifest/render.js";
