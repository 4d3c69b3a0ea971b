/**
 * DTO package public surface.
 * Re-exports stable enums, reason codes and wire types shared by every package.
 */
export * from './enums';
export * from './reasons';
export * from './flight';
