/**
 * Asset handle boundary
 *
 * Loading happens outside the simulation. The core only asks whether a
 * reference is usable right now and never waits for the answer to change.
 */

export type AssetResolution<H> =
  | { status: 'ready'; handle: H }
  | { status: 'pending' }
  | { status: 'failed'; reason: string }

export interface AssetResolver<H> {
  resolve(ref: string): AssetResolution<H>
}

/** Resolver for worlds that publish without any visual assets */
export const NULL_ASSET_RESOLVER: AssetResolver<never> = {
  resolve: (ref) => ({ status: 'failed', reason: `no asset resolver configured for '${ref}'` }),
}
