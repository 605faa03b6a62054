/**
 * Uniform random number source.
 *
 * Returns a float in [0, 1). `Math.random` satisfies it; tests inject
 * scripted sequences and hosts may inject a seeded generator.
 */
export type RandomSource = () => number;
