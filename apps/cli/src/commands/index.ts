export { createAddCommand } from './add.js';
export { createShowCommand } from './show.js';
export { createListCommand } from './list.js';
export { createUpdateCommand } from './update.js';
export { createDeleteCommand } from './delete.js';
export { createLinkCommand } from './link.js';
export { createUnlinkCommand } from './unlink.js';
export { createDepsCommand } from './deps.js';
export { createSearchCommand } from './search.js';
export { createExportCommand } from './export.js';
export { createImportCommand } from './import.js';
export { createStatsCommand } from './stats.js';
export { createDoctorCommand } from './doctor.js';
export { createGraphCommand } from './graph.js';
export { createDemoCommand } from './demo.js';
