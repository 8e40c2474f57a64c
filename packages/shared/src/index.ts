export type * from './types/credentials';
export type * from './types/component';
export type * from './types/pull-request';
export type * from './types/image';
export type * from './types/outcome';
export type * from './types/events';
export type * from './types/api';
