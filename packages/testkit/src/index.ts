export { assert, describe, test } from "./nodeTest.js";
export { recordWarnings, type WarningRecorder } from "./warnings.js";
