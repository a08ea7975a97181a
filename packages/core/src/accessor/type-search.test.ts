import { describe, it } from "mocha";
import { expect } from "chai";
import { defineModule } from "../runtime/module-info.js";
import { defineType } from "../runtime/type-info.js";
import {
  EmptySample,
  Sample,
  fixturesModule,
  sampleType,
} from "../types/test-fixtures.js";
import {
  AmbiguousTypeNameError,
  MemberNotFoundError,
  ReflectionError,
} from "./errors.js";
import {
  getExpectedModuleType,
  getExpectedType,
  getExpectedTypeOf,
  tryGetModuleType,
  tryGetType,
} from "./type-search.js";

class ShadowSample {}

const shadowModule = defineModule({
  name: "shadow",
  location: "shadow/index.js",
  types: [defineType(ShadowSample, { namespace: "Fixtures", name: "Sample" })],
});

const unrelatedModule = defineModule({ name: "unrelated", types: [] });

describe("Type search", () => {
  describe("getExpectedType", () => {
    it("should find a type defined by exactly one module", () => {
      expect(
        getExpectedType("Fixtures.Sample", [unrelatedModule, fixturesModule])
      ).to.equal(sampleType);
    });

    it("should throw MemberNotFoundError when no module defines the name", () => {
      expect(() =>
        getExpectedType("NOTTHERE", [fixturesModule, unrelatedModule])
      ).to.throw(
        MemberNotFoundError,
        "Type 'NOTTHERE' not found in any loaded module."
      );
    });

    it("should throw MemberNotFoundError for an empty snapshot", () => {
      expect(() => getExpectedType("Fixtures.Sample", [])).to.throw(
        MemberNotFoundError
      );
    });

    it("should throw AmbiguousTypeNameError when two modules define the name", () => {
      expect(() =>
        getExpectedType("Fixtures.Sample", [fixturesModule, shadowModule])
      ).to.throw(
        AmbiguousTypeNameError,
        "More than one type named 'Fixtures.Sample' in loaded modules."
      );
    });

    it("should report the defining modules in the hint", () => {
      const result = tryGetType("Fixtures.Sample", [fixturesModule, shadowModule]);
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("RFL1002");
        expect(result.error.hint).to.equal(
          "Defined in: fixtures, shadow. Search a single module instead."
        );
      }
    });

    it("should accept any iterable of modules", () => {
      const modules = new Set([shadowModule]);
      expect(getExpectedType("Fixtures.Sample", modules).runtimeClass).to.equal(
        ShadowSample
      );
    });
  });

  describe("getExpectedModuleType", () => {
    it("should find a type of the module", () => {
      expect(getExpectedModuleType(fixturesModule, "Fixtures.EmptySample").runtimeClass).to.equal(
        EmptySample
      );
    });

    it("should search only the given module, so the shared name is not ambiguous", () => {
      expect(getExpectedModuleType(shadowModule, "Fixtures.Sample").runtimeClass).to.equal(
        ShadowSample
      );
    });

    it("should name the module location when the type is missing", () => {
      const result = tryGetModuleType(shadowModule, "NOTTHERE");
      expect(result).to.deep.equal({
        ok: false,
        error: {
          code: "RFL1003",
          severity: "error",
          message: "Type 'NOTTHERE' not found in module 'shadow/index.js'.",
        },
      });
      expect(() => getExpectedModuleType(shadowModule, "NOTTHERE")).to.throw(
        MemberNotFoundError
      );
    });
  });

  describe("getExpectedTypeOf", () => {
    it("should return the type of a described instance", () => {
      expect(getExpectedTypeOf(new Sample())).to.equal(sampleType);
    });

    it("should throw MemberNotFoundError for an undescribed class", () => {
      class Plain {}
      try {
        getExpectedTypeOf(new Plain());
        expect.fail("expected a lookup failure");
      } catch (error) {
        expect(error).to.be.instanceOf(MemberNotFoundError);
        expect(error).to.be.instanceOf(ReflectionError);
        if (error instanceof ReflectionError) {
          expect(error.code).to.equal("RFL1004");
          expect(error.message).to.equal("Class 'Plain' has no type metadata.");
          expect(error.format()).to.equal(
            "error RFL1004: Class 'Plain' has no type metadata. Hint: Describe the class with defineType before accessing its members."
          );
        }
      }
    });
  });
});
