/**
 * DTO package public surface.
 * Re-exports stable enums, reason codes and the candidate/checkpoint shapes shared by every package.
 */
export * from './enums';
export * from './reasons';
export * from './candidates';
