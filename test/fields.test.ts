import { describe, expect, test } from "vitest";
import { parseFieldArgs } from "../src/lib/fields.ts";
import { CliError } from "../src/lib/errors.ts";

describe("parseFieldArgs", () => {
  test("parses --field=value tokens in order", () => {
    const fields = parseFieldArgs([
      "--comment_post_ID=15",
      "--comment_content=hello blog",
      "--comment_author=cli",
    ]);
    expect(Object.entries(fields)).toEqual([
      ["comment_post_ID", "15"],
      ["comment_content", "hello blog"],
      ["comment_author", "cli"],
    ]);
  });

  test("keeps everything after the first =", () => {
    expect(parseFieldArgs(["--comment_author_url=https://example.com/?a=b"])).toEqual({
      comment_author_url: "https://example.com/?a=b",
    });
  });

  test("accepts an empty value", () => {
    expect(parseFieldArgs(["--comment_author="])).toEqual({ comment_author: "" });
  });

  test("parses --field value pairs", () => {
    expect(parseFieldArgs(["--comment_post_ID", "15", "--comment_type=pingback"])).toEqual({
      comment_post_ID: "15",
      comment_type: "pingback",
    });
  });

  test("last value wins", () => {
    expect(parseFieldArgs(["--comment_author=a", "--comment_author=b"])).toEqual({
      comment_author: "b",
    });
  });

  test("rejects bare words", () => {
    expect(() => parseFieldArgs(["hello"])).toThrow(
      "Unexpected argument 'hello'. Fields are passed as --<field>=<value>.",
    );
  });

  test("rejects a field without a value", () => {
    expect(() => parseFieldArgs(["--comment_author"])).toThrow(CliError);
    expect(() => parseFieldArgs(["--comment_author", "--comment_post_ID=1"])).toThrow(
      "Missing value for field 'comment_author'. Use --comment_author=<value>.",
    );
  });

  test("rejects a missing field name", () => {
    expect(() => parseFieldArgs(["--=x"])).toThrow("Missing field name in '--=x'.");
  });
});
