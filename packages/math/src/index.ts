/**
 * Math public surface. Pure, side-effect free helpers.
 * Export only stable functions via this barrel for tree-shaking.
 */
export * from './encoding'
export * from './scoring'
export * from './probability'
