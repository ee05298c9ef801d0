export * from './types/map';
export * from './config/constants';
export * from './protocol/ports';
export * from './schema/mapFile';
export * from './utils/geometry';
export * from './utils/waypoints';
