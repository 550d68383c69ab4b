export * from './physics'
export * from './platformer'
export * from './pools'
