export { GameApiServer, parseCreateSessionInput, parseCommandInput, statusForError } from "./server.js";
export type { GameApiServerConfig, CreateSessionInput } from "./server.js";
