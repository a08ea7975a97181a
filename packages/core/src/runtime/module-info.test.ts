import { describe, it } from "mocha";
import { expect } from "chai";
import { ModuleCatalog, defineModule } from "./module-info.js";
import { TypeInfo } from "./type-info.js";
import { fixturesModule, sampleType } from "../types/test-fixtures.js";

describe("Modules", () => {
  describe("ModuleInfo", () => {
    it("should look types up by full name", () => {
      expect(fixturesModule.getType("Fixtures.Sample")).to.equal(sampleType);
      expect(fixturesModule.getType("Sample")).to.equal(undefined);
      expect(fixturesModule.getTypes()).to.have.length(2);
    });

    it("should default the location to the module name", () => {
      expect(defineModule({ name: "bare", types: [] }).location).to.equal("bare");
      expect(fixturesModule.location).to.equal("types/test-fixtures.ts");
    });

    it("should reject two types with the same full name", () => {
      class First {}
      class Second {}
      expect(() =>
        defineModule({
          name: "clash",
          types: [
            new TypeInfo(First, { namespace: "Clash", name: "Same" }),
            new TypeInfo(Second, { namespace: "Clash", name: "Same" }),
          ],
        })
      ).to.throw(Error, "Module 'clash' defines type 'Clash.Same' twice.");
    });
  });

  describe("ModuleCatalog", () => {
    it("should snapshot loaded modules in load order", () => {
      const catalog = new ModuleCatalog();
      const other = defineModule({ name: "other", types: [] });

      catalog.load(fixturesModule);
      catalog.load(other);

      expect(catalog.snapshot()).to.deep.equal([fixturesModule, other]);
      expect(catalog.get("other")).to.equal(other);
    });

    it("should not change a snapshot taken before unloading", () => {
      const catalog = new ModuleCatalog();
      catalog.load(fixturesModule);
      const before = catalog.snapshot();

      expect(catalog.unload("fixtures")).to.equal(true);
      expect(catalog.unload("fixtures")).to.equal(false);

      expect(before).to.have.length(1);
      expect(catalog.snapshot()).to.have.length(0);
    });

    it("should reject a second module with the same name", () => {
      const catalog = new ModuleCatalog();
      catalog.load(fixturesModule);
      expect(() => catalog.load(defineModule({ name: "fixtures", types: [] }))).to.throw(
        Error,
        "Module 'fixtures' is already loaded."
      );
    });
  });
});
