export { CircleRegistry } from './circle.service';
export type { CreateCircleInput, UpdateCircleInput, JoinResult, DeleteResult } from './types';
