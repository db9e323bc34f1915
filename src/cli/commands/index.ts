export { addCommand } from './add.js';
export { listCommand } from './list.js';
export { searchCommand } from './search.js';
export { editCommand } from './edit.js';
export { statusSetCommand } from './statusSet.js';
export { deleteCommand } from './delete.js';
export { copyCommand } from './copy.js';
export { openCommand } from './open.js';
export { statsCommand } from './stats.js';
export { syncCommand } from './sync.js';
export { configCommand } from './config.js';
