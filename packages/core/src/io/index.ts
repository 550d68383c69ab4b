export * from './input'
export * from './assets'
export * from './render'
