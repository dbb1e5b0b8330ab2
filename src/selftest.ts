import assert from "node:assert/strict";
import { translate } from "./translator.js";
import { toPlain, type PlainValue } from "./value/json.js";

export interface SelfTestCase {
  name: string;
  source: string;
  expected: PlainValue;
}

export const SELF_TEST_CASES: SelfTestCase[] = [
  {
    name: "basic_dict",
    source: `
      @{
        port = 0b111111011000;
        host = [[localhost]];
      }
    `,
    expected: { port: 4056, host: "localhost" },
  },
  {
    name: "arrays_and_nested_dict",
    source: `
      @{
        numbers = array(0b1, 0b10, 0b11);
        nested  = @{
          name = [[inner]];
        };
      }
    `,
    expected: { numbers: [1, 2, 3], nested: { name: "inner" } },
  },
  {
    name: "consts",
    source: `
      (def base_port 0b111111011000);
      (def host_name [[localhost]]);

      @{
        port = $base_port$;
        host = $host_name$;
      }
    `,
    expected: { port: 4056, host: "localhost" },
  },
  {
    name: "two_domains",
    source: `
      (def default_port 0b1010001011);
      (def base_hp 0b1100100);

      @{
        network = @{
          name = [[main_server]];
          port = $default_port$;
          tags = array([[web]], [[prod]]);
        };
        game = @{
          player = [[Hero]];
          hp = $base_hp$;
        };
      }
    `,
    expected: {
      network: { name: "main_server", port: 651, tags: ["web", "prod"] },
      game: { player: "Hero", hp: 100 },
    },
  },
];

/**
 * Run the built-in fixtures. Any failure throws; on success the pass count is
 * logged and returned.
 */
export function runSelfTests(
  cases: SelfTestCase[] = SELF_TEST_CASES,
  log: (line: string) => void = console.log,
): number {
  let passed = 0;
  for (const testCase of cases) {
    const result = translate(testCase.source, testCase.name);
    if (result.errors.length > 0 || result.value === undefined) {
      const message = result.errors[0]?.message ?? "no value produced";
      throw new Error(`${testCase.name} failed: ${message}`);
    }
    assert.deepEqual(toPlain(result.value), testCase.expected, `${testCase.name} failed`);
    passed++;
  }
  log(`All self-tests passed: ${passed}`);
  return passed;
}
