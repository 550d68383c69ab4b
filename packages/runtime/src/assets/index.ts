/**
 * Assets module barrel export
 */

export {
  AssetRegistry,
  ASSET_LOAD_TIMEOUT_MS,
  type AssetLoadFn,
  type AssetRegistryOptions,
} from './AssetRegistry'
