export * from './errors';
export * from './logger';
export * from './config';
export * from './math/vec2';
export * from './color/color';

// Easing curves and the step contract
export * from './anim/easing';
export * from './anim/spec';
export * from './anim/adapter';
export * from './anim/registryAdapter';
export * from './anim/windowAdapter';
export * from './anim/step';
export * from './anim/combinators';
export * from './anim/batch';

// Clocks, drivers and the engine facade
export * from './anim/clock';
export * from './anim/driver';
export * from './anim/animationBuilder';
export * from './anim/playback';
