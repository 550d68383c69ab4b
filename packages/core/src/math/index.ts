export * from './aabb'
export * from './rng'
