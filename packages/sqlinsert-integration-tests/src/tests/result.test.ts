/**
 * Tests for Result helpers
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { attempt, failure, success } from "@sqlinsert/core";

describe("Result", () => {
  it("should build success and failure results", () => {
    expect(success(3)).to.deep.equal({ success: true, data: 3 });
    const error = new Error("boom");
    expect(failure(error)).to.deep.equal({ success: false, error });
  });

  describe("attempt", () => {
    it("should capture sync and async return values", async () => {
      expect(await attempt(() => 1)).to.deep.equal(success(1));
      expect(await attempt(async () => "a")).to.deep.equal(success("a"));
    });

    it("should keep the thrown value untouched", async () => {
      const error = new Error("driver failed");
      const syncResult = await attempt(() => {
        throw error;
      });
      expect(syncResult.success).to.equal(false);
      if (!syncResult.success) {
        expect(syncResult.error).to.equal(error);
      }

      const asyncResult = await attempt(async () => {
        throw "plain string";
      });
      expect(asyncResult).to.deep.equal(failure("plain string"));
    });
  });
});
