/**
 * Domain model exports.
 */

export * from './account';
export * from './activity';
export * from './ddns-protocol';
export * from './decision';
export * from './errors';
export * from './realm';
export * from './token';
