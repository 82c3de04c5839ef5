// @whatif/types — barrel export
export type * from './common.js';
export type * from './config.js';

// 브랜드 팩토리 함수
export { createTargetId } from './common.js';
