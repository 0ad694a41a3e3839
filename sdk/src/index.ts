export * from './errors.js';

export * from './math/fixed.js';
export * from './math/epoch.js';
export * from './math/emission.js';
export * from './math/period.js';
export * from './math/accrual.js';

export * from './types/config.js';
export * from './types/enums.js';
export * from './types/services.js';
export * from './types/structs.js';
