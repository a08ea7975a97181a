import { describe, it } from "mocha";
import { expect } from "chai";
import { MemberAccessError, TargetParameterCountError } from "./errors.js";
import { TypeInfo } from "./type-info.js";
import { EmptySample, Sample, sampleType } from "../types/test-fixtures.js";

const field = (name: string, scope: "instance" | "static" = "instance") => {
  const info = sampleType.getField(name, scope);
  if (!info) throw new Error(`fixture field '${name}' missing`);
  return info;
};

const property = (name: string, scope: "instance" | "static" = "instance") => {
  const info = sampleType.getProperty(name, scope);
  if (!info) throw new Error(`fixture property '${name}' missing`);
  return info;
};

const method = (name: string, parameterTypes: readonly ("number" | "string")[]) => {
  const info = sampleType.getMethodWithSignature(name, "instance", parameterTypes);
  if (!info) throw new Error(`fixture method '${name}' missing`);
  return info;
};

describe("Member descriptors", () => {
  describe("FieldInfo", () => {
    it("should read and write an instance field", () => {
      const instance = new Sample();
      field("publicField").setValue(instance, 12);
      expect(instance.publicField).to.equal(12);
      expect(field("publicField").getValue(instance)).to.equal(12);
    });

    it("should use the class as the target of a static field", () => {
      field("staticPublicField", "static").setValue(undefined, 3);
      expect(Sample.staticPublicField).to.equal(3);
      expect(field("staticPublicField", "static").getValue()).to.equal(3);
    });

    it("should require a target for instance fields", () => {
      expect(() => field("publicField").getValue()).to.throw(
        MemberAccessError,
        "Non-static field 'Sample.publicField' requires a target instance."
      );
    });

    it("should reject a target of another class", () => {
      expect(() => field("publicField").getValue(new EmptySample())).to.throw(
        MemberAccessError,
        "field 'Sample.publicField' is not defined on the target object."
      );
    });

    it("should report an assignment the target refuses", () => {
      const instance = Object.freeze(new Sample());
      expect(() => field("publicField").setValue(instance, 1)).to.throw(
        MemberAccessError,
        "'Sample.publicField' cannot be assigned on the target."
      );
    });
  });

  describe("PropertyInfo", () => {
    it("should go through accessors", () => {
      const instance = new Sample();
      property("publicProperty").setValue(instance, 21);
      expect(property("doubledProperty").getValue(instance)).to.equal(42);
    });

    it("should refuse to write a read-only property", () => {
      expect(property("doubledProperty").canWrite).to.equal(false);
      expect(() =>
        property("doubledProperty").setValue(new Sample(), 1)
      ).to.throw(MemberAccessError, "Property 'Sample.doubledProperty' has no setter.");
    });

    it("should call the indexer getter and setter with index arguments", () => {
      const indexer = sampleType.getProperties().find((p) => p.isIndexer);
      const instance = new Sample();
      instance.indexedValue = [0, 0];

      indexer?.setValue(instance, 5, [1]);

      expect(instance.indexedValue).to.deep.equal([0, 5]);
      expect(indexer?.getValue(instance, [1])).to.equal(5);
    });

    it("should check the number of index arguments", () => {
      const indexer = sampleType.getProperties().find((p) => p.isIndexer);
      expect(() => indexer?.getValue(new Sample(), [])).to.throw(
        TargetParameterCountError,
        "Parameter count mismatch for 'Sample.Item': expected 1, got 0."
      );
      expect(() => property("publicProperty").getValue(new Sample(), [0])).to.throw(
        TargetParameterCountError
      );
    });
  });

  describe("MethodInfo", () => {
    it("should call the implementing function with the arguments", () => {
      const instance = new Sample();
      expect(method("methodWithNumberParameter", ["number"]).invoke(instance, [7])).to.equal(7);
      expect(instance.methodWithNumberParameterData).to.equal(7);
    });

    it("should dispatch overloads to their implementations", () => {
      const instance = new Sample();
      expect(method("overloaded", []).invoke(instance)).to.equal("none");
      expect(method("overloaded", ["string"]).invoke(instance, ["a"])).to.equal(
        "string:a"
      );
    });

    it("should return undefined for void methods", () => {
      class Echo {
        run(): string {
          return "ignored";
        }
      }
      const type = new TypeInfo(Echo, { methods: [{ name: "run" }] });
      expect(type.getMethod("run", "instance")?.invoke(new Echo())).to.equal(undefined);
    });

    it("should check the number of arguments", () => {
      expect(() =>
        method("methodWithNumberParameter", ["number"]).invoke(new Sample(), [])
      ).to.throw(
        TargetParameterCountError,
        "Parameter count mismatch for 'Sample.methodWithNumberParameter': expected 1, got 0."
      );
    });

    it("should let errors of the invoked method through unchanged", () => {
      expect(() => method("failingMethod", []).invoke(new Sample())).to.throw(
        RangeError,
        "failing method ran"
      );
    });

    it("should report an implementation that is not a function", () => {
      class Broken {
        run = 1;
      }
      const type = new TypeInfo(Broken, { methods: [{ name: "run" }] });
      expect(() => type.getMethod("run", "instance")?.invoke(new Broken())).to.throw(
        MemberAccessError,
        "'Broken.run' is implemented by 'run', which is not a function on the target."
      );
    });
  });
});
