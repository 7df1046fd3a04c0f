export * from './animation';
export * from './config';
export * from './errors';
export * from './gltf';
export * from './skeleton';
