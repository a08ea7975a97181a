import { describe, it } from "mocha";
import { expect } from "chai";
import { categoryOf, createDiagnostic, formatDiagnostic } from "./diagnostic.js";

describe("Diagnostic", () => {
  describe("createDiagnostic", () => {
    it("should create an error diagnostic without a hint", () => {
      expect(createDiagnostic("RFL2001", "missing")).to.deep.equal({
        code: "RFL2001",
        severity: "error",
        message: "missing",
      });
    });

    it("should keep the hint when given", () => {
      expect(createDiagnostic("RFL1002", "twice", "pick one").hint).to.equal(
        "pick one"
      );
    });
  });

  describe("categoryOf", () => {
    it("should classify lookup, ambiguity, null and metadata codes", () => {
      expect(categoryOf("RFL1001")).to.equal("not-found");
      expect(categoryOf("RFL1004")).to.equal("not-found");
      expect(categoryOf("RFL2006")).to.equal("not-found");
      expect(categoryOf("RFL1002")).to.equal("ambiguous-type-name");
      expect(categoryOf("RFL3001")).to.equal("null-argument");
      expect(categoryOf("RFL9003")).to.equal("metadata");
    });
  });

  describe("formatDiagnostic", () => {
    it("should format severity, code and message", () => {
      const diagnostic = createDiagnostic("RFL2004", "Type 'X' has no indexer property.");
      expect(formatDiagnostic(diagnostic)).to.equal(
        "error RFL2004: Type 'X' has no indexer property."
      );
    });

    it("should append the hint", () => {
      const diagnostic = createDiagnostic("RFL3001", "null argument", "pass types");
      expect(formatDiagnostic(diagnostic)).to.equal(
        "error RFL3001: null argument Hint: pass types"
      );
    });
  });
});
