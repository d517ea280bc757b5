import { describe, test, expect } from "vitest";

import { collectResults, err, ok, type Result } from "../../src/shared/result.js";

describe("Result helpers", () => {
  test("ok and err build the two variants", () => {
    expect(ok(3)).toEqual({ ok: true, value: 3 });
    expect(err("boom")).toEqual({ ok: false, error: "boom" });
  });

  test("collectResults keeps order and stops at the first failure", () => {
    const seen: number[] = [];
    const check = (n: number): Result<number, string> => {
      seen.push(n);
      return n < 0 ? err(`negative: ${n}`) : ok(n * 2);
    };

    expect(collectResults([1, 2, 3], check)).toEqual({ ok: true, value: [2, 4, 6] });
    seen.length = 0;
    expect(collectResults([1, -2, 3], check)).toEqual({ ok: false, error: "negative: -2" });
    expect(seen).toEqual([1, -2]);
  });
});
