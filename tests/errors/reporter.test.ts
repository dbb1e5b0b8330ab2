import { beforeAll, describe, it, expect } from "vitest";
import chalk from "chalk";
import { formatDiagnostic, formatDiagnostics } from "../../src/errors/reporter.js";
import { translate } from "../../src/translator.js";

describe("reporter", () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  it("formats an error with its source line and help", () => {
    const source = "@{ a = $missing$; }";
    const { errors } = translate(source, "config.conf");
    expect(errors).toHaveLength(1);
    expect(formatDiagnostic(source, errors[0])).toBe(
      "syntax error: Unknown constant 'missing'\n" +
      "  --> config.conf:1:8\n" +
      "  |\n" +
      "1 | @{ a = $missing$; }\n" +
      "  |        ^^^^^^^^^\n" +
      "  = help: Constants must be defined with (def name value); before the value that references them\n",
    );
  });

  it("labels warnings", () => {
    const source = "(def a 0b1);\n(def a 0b10);\n$a$";
    const { warnings } = translate(source, "config.conf");
    expect(formatDiagnostic(source, warnings[0])).toBe(
      "warning: Constant 'a' is redefined\n" +
      "  --> config.conf:2:6\n" +
      "  |\n" +
      "2 | (def a 0b10);\n" +
      "  |      ^\n" +
      "  = help: The earlier value 0b1 is replaced\n",
    );
  });

  it("underlines a multi-line token to the end of its first line", () => {
    const source = "0b1 [[a\nb]]";
    const { errors } = translate(source, "config.conf");
    expect(errors[0].code).toBe("TrailingInput");
    const lines = formatDiagnostic(source, errors[0]).split("\n");
    expect(lines).toContain("1 | 0b1 [[a");
    expect(lines).toContain("  |     ^^^");
  });

  it("joins several diagnostics with a blank line", () => {
    const source = "(def a 0b1);\n(def a 0b10);\n(def a 0b11);\n$a$";
    const { warnings } = translate(source, "config.conf");
    const text = formatDiagnostics(source, warnings);
    expect(text.split("warning:")).toHaveLength(3);
    expect(text).toContain("help: The earlier value 0b1 is replaced\n\nwarning:");
  });
});
