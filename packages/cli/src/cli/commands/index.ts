export { handleEditCommand, viewportFor } from './edit.js';
export type { EditCommandDeps } from './edit.js';
