/**
 * @stubgen/native -- the operator registry: loading `native_functions.yaml`
 * and grouping its functions into variant groups.
 */
export { parseNativeYaml, loadNativeYaml } from "./parse.js";
export type { NativeYaml } from "./parse.js";
export { getGroupedNativeFunctions } from "./grouping.js";
