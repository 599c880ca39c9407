import { describe, it } from "mocha";
import { expect } from "chai";

import {
  DimensionMismatchError,
  ERROR_CODES,
  ERROR_TEXT_MAX_LENGTH,
  normaliseErrorMessage,
  toToolFailure,
} from "../src/errors.js";

describe("error normalisation", () => {
  it("collapses whitespace and caps the length of messages", () => {
    expect(normaliseErrorMessage("  vector \n index   missing ")).to.equal("vector index missing");
    expect(normaliseErrorMessage("   ")).to.equal("unexpected error");
    const capped = normaliseErrorMessage("x".repeat(ERROR_TEXT_MAX_LENGTH + 10));
    expect(capped).to.have.length(ERROR_TEXT_MAX_LENGTH);
    expect(capped.endsWith("…")).to.equal(true);
  });

  it("turns engine errors into tool failures with their hint", () => {
    expect(toToolFailure(new DimensionMismatchError(3, 2, "faqs query"))).to.deep.equal({
      ok: false,
      code: ERROR_CODES.INDEX_DIMENSION,
      message: "faqs query: expected dimension 3, received 2",
      hint: "rebuild the vector index with the embedder used for queries",
    });
  });

  it("maps foreign errors onto the invalid input code", () => {
    expect(toToolFailure(new Error("boom"))).to.deep.equal({
      ok: false,
      code: ERROR_CODES.QUERY_INVALID_INPUT,
      message: "boom",
    });
    expect(toToolFailure("plain")).to.deep.include({ message: "plain" });
  });
});
