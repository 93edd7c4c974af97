export {
  createApiCompositionRoot,
  type ApiCompositionRoot,
  type ApiCompositionRootDeps,
} from "./bootstrap/composition-root.js";
export { loadApiConfig, type ApiConfig } from "./bootstrap/config.js";
export {
  createTranslateHandler,
  type TranslateHandler,
} from "./handlers/translate.js";
export { toApiErrorResponse } from "./http/errors.js";
export type { ApiResponse, Headers } from "./http/types.js";
