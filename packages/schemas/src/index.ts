export * from "./types.js";
export { WorldDefinitionSchema } from "./world.schema.js";
export { JournalEventSchema } from "./journal-event.schema.js";
export { validateWorldDefinitionData, validateJournalEventData, checkWorldDefinition } from "./validator.js";
export type { ValidationResult, WorldDefinitionCheck } from "./validator.js";
