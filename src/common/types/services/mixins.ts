/**
 * Type utilities for mixins
 */

// A mixin's constructor must take `...args: any[]`
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type AbstractConstructor<T = {}> = abstract new (...args: any[]) => T;

/**
 * Base accepted by every capability mixin. Concrete classes satisfy it too;
 * the mixin classes themselves are abstract, so services always subclass them.
 */
export type MixinBase<T = {}> = AbstractConstructor<T>;
