import { assert, test } from "../nodeTest.js";
import { recordWarnings } from "../warnings.js";

test("recordWarnings keeps messages in arrival order", () => {
  const recorder = recordWarnings();
  recorder.warn("first");
  recorder.warn("second");
  assert.deepEqual(recorder.messages, ["first", "second"]);
});

test("recordWarnings clear empties the same message list", () => {
  const recorder = recordWarnings();
  const messages = recorder.messages;
  recorder.warn("dropped");
  recorder.clear();
  assert.equal(messages.length, 0);
  recorder.warn("kept");
  assert.deepEqual(recorder.messages, ["kept"]);
});
