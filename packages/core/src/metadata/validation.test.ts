import { describe, it } from "mocha";
import { expect } from "chai";
import { validateMetadataFile } from "./validation.js";

describe("Metadata validation", () => {
  it("should accept a complete file", () => {
    const result = validateMetadataFile(
      {
        module: "Demo.Shapes",
        location: "demo/shapes.js",
        types: [
          {
            fullName: "Demo.Shapes.Circle",
            export: "Circle",
            fields: [{ name: "radius", type: "number" }],
            properties: [{ name: "area", type: "number", readonly: true }],
            indexers: [
              { parameters: ["number"], type: "number", getter: "at" },
            ],
            methods: [
              { name: "scale", parameters: ["number"], isStatic: false },
            ],
          },
        ],
      },
      "/tmp/shapes.metadata.json"
    );

    expect(result.ok).to.equal(true);
    if (result.ok) {
      expect(result.value.module).to.equal("Demo.Shapes");
      expect(result.value.location).to.equal("demo/shapes.js");
      expect(result.value.types[0]?.properties?.[0]?.readonly).to.equal(true);
      expect(result.value.types[0]?.indexers?.[0]?.getter).to.equal("at");
      expect(result.value.types[0]?.methods?.[0]?.parameters).to.deep.equal([
        "number",
      ]);
    }
  });

  it("should reject a non-object document", () => {
    const result = validateMetadataFile([], "/tmp/list.metadata.json");
    expect(result.ok).to.equal(false);
    if (!result.ok) {
      expect(result.error[0]?.code).to.equal("RFL9004");
      expect(result.error[0]?.message).to.equal(
        "Metadata file must be an object, got array"
      );
    }
  });

  it("should report missing module and types fields", () => {
    const result = validateMetadataFile({}, "/tmp/empty.metadata.json");
    expect(result.ok).to.equal(false);
    if (!result.ok) {
      expect(result.error.map((d) => d.code)).to.deep.equal(["RFL9005", "RFL9006"]);
      expect(result.error[0]?.message).to.equal(
        "Missing or invalid 'module' field in empty.metadata.json"
      );
    }
  });

  it("should report every invalid member with its position", () => {
    const result = validateMetadataFile(
      {
        module: "Broken",
        types: [
          {
            fullName: "Broken.Thing",
            export: "Thing",
            fields: [{ name: "size" }, "oops"],
            methods: [{ name: "run", isStatic: "yes", accessibility: "internal" }],
          },
          { export: "Other" },
        ],
      },
      "/tmp/broken.metadata.json"
    );

    expect(result.ok).to.equal(false);
    if (!result.ok) {
      expect(result.error.map((d) => d.message)).to.deep.equal([
        "Invalid type 0 in broken.metadata.json fields[0]: missing or invalid 'type'",
        "Invalid type 0 in broken.metadata.json fields[1]: must be an object",
        "Invalid type 0 in broken.metadata.json methods[0]: 'isStatic' must be a boolean",
        "Invalid type 0 in broken.metadata.json methods[0]: 'accessibility' must be \"public\" or \"private\"",
        "Invalid type 1 in broken.metadata.json: missing or invalid 'fullName'",
      ]);
      expect(result.error.map((d) => d.code)).to.deep.equal([
        "RFL9008",
        "RFL9008",
        "RFL9008",
        "RFL9008",
        "RFL9007",
      ]);
    }
  });

  it("should require member lists to be arrays", () => {
    const result = validateMetadataFile(
      { module: "M", types: [{ fullName: "M.T", export: "T", methods: {} }] },
      "/tmp/m.metadata.json"
    );
    expect(result.ok).to.equal(false);
    if (!result.ok) {
      expect(result.error[0]?.message).to.equal(
        "Invalid type 0 in m.metadata.json: 'methods' must be an array"
      );
    }
  });
});
