export * from './errors.js';
export * from './json.js';
export * from './topic-match.js';
export * from './topic-info.js';
export * from './broker-stats.js';
export * from './publish-request.js';
export * from './channels.js';
export * from './pubsub.js';
