export * from './certificate.js';
export * from './certificate-config.js';
export * from './conditions.js';
export * from './group-version.js';
export * from './object-meta.js';
