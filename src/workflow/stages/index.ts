export { intakeStage } from "./intake.js";
export { understandStage, prepareStage } from "./understanding.js";
export { askStage, waitStage } from "./clarification.js";
export { retrieveStage, decideStage } from "./retrieval.js";
export { updateStage, createStage, RESPONSE_SYSTEM_MESSAGE } from "./resolution.js";
export { doStage, completeStage } from "./completion.js";
