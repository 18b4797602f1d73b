export { Journal } from "./journal.js";
export type { JournalOptions } from "./journal.js";
