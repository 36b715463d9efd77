export { createOllamaClient, type OllamaClientConfig } from "./client";
export { generateResponseSchema, type GenerateResponse } from "./schemas";
