export type { IGenerationClient } from "./generation-client.interface.js";
export {
  OllamaGenerationClient,
  buildGenerateRequest,
  DEFAULT_SAMPLING,
} from "./ollama-client.js";
export type { OllamaClientConfig, OllamaGenerateRequest } from "./ollama-client.js";
