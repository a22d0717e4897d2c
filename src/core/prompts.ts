export { ask, askUntilValid } from "./prompts/ask.js";
export { ClackAnswerSource } from "./prompts/answer-source.js";
export type { AnswerSource, ConfirmQuestion, SelectQuestion, TextQuestion } from "./prompts/answer-source.js";
export { collectManifest, moduleNameFromSource } from "./prompts/collect-manifest.js";
export { INTRO_TEXT } from "./prompts/constants.js";
export {
  formatVersion,
  validateCommands,
  validateLicense,
  validateName,
  validatePackageName,
  validateVersion,
  validateWasmSource
} from "./prompts/validators.js";
export type { ValidationResult, Validator } from "./prompts/validators.js";
