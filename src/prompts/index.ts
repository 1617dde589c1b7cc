export {
  CLASSIFICATION_SYSTEM_PROMPT,
  buildClassificationPrompt,
} from "./classification";
export { EXTRACTION_SYSTEM_PROMPT, buildExtractionPrompt } from "./extraction";
