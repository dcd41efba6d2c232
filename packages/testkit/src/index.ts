export { createRng, nextInt, withSeed, type Rng } from "./rng.js";
export { assert, assertClose, describe, test } from "./nodeTest.js";
