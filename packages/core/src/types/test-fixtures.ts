/**
 * Described sample classes shared by the accessor and runtime tests.
 */

import { defineModule } from "../runtime/module-info.js";
import { defineType } from "../runtime/type-info.js";

export class EmptySample {}

export class Sample {
  publicField = 0;
  secretField = "hidden";
  indexedValue: number[] = [];

  parameterlessMethodCalled = false;
  methodWithNumberParameterData = 0;

  private propertyValue = 0;

  static staticPublicField = 0;
  static staticParameterlessMethodCalled = false;
  static staticMethodWithStringParameterData = "";

  private static staticPropertyValue = 0;

  get publicProperty(): number {
    return this.propertyValue;
  }

  set publicProperty(value: number) {
    this.propertyValue = value;
  }

  get doubledProperty(): number {
    return this.propertyValue * 2;
  }

  static get staticPublicProperty(): number {
    return Sample.staticPropertyValue;
  }

  static set staticPublicProperty(value: number) {
    Sample.staticPropertyValue = value;
  }

  getItem(index: number): number | undefined {
    return this.indexedValue[index];
  }

  setItem(index: number, value: number): void {
    this.indexedValue[index] = value;
  }

  parameterlessMethod(): void {
    this.parameterlessMethodCalled = true;
  }

  methodWithNumberParameter(data: number): number {
    this.methodWithNumberParameterData = data;
    return data;
  }

  overloadedNone(): string {
    return "none";
  }

  overloadedNumber(value: number): string {
    return `number:${value}`;
  }

  overloadedString(value: string): string {
    return `string:${value}`;
  }

  overloadedSample(value: Sample): string {
    return `sample:${value.publicField}`;
  }

  failingMethod(): never {
    throw new RangeError("failing method ran");
  }

  static staticParameterlessMethod(): void {
    Sample.staticParameterlessMethodCalled = true;
  }

  static staticMethodWithStringParameter(data: string): string {
    Sample.staticMethodWithStringParameterData = data;
    return data;
  }

  static staticOverloadedNone(): number {
    return 0;
  }

  static staticOverloadedNumber(value: number): number {
    return value + 1;
  }
}

export const emptySampleType = defineType(EmptySample, {
  namespace: "Fixtures",
});

export const sampleType = defineType(Sample, {
  namespace: "Fixtures",
  fields: [
    { name: "publicField", type: "number" },
    { name: "secretField", type: "string", accessibility: "private" },
    { name: "indexedValue", type: Array },
    { name: "parameterlessMethodCalled", type: "boolean" },
    { name: "methodWithNumberParameterData", type: "number" },
    { name: "staticPublicField", type: "number", isStatic: true },
    {
      name: "staticParameterlessMethodCalled",
      type: "boolean",
      isStatic: true,
    },
    {
      name: "staticMethodWithStringParameterData",
      type: "string",
      isStatic: true,
    },
  ],
  properties: [
    { name: "publicProperty", type: "number" },
    { name: "doubledProperty", type: "number", readonly: true },
    { name: "staticPublicProperty", type: "number", isStatic: true },
  ],
  indexers: [
    {
      parameters: ["number"],
      type: "number",
      getter: "getItem",
      setter: "setItem",
    },
  ],
  methods: [
    { name: "parameterlessMethod" },
    {
      name: "methodWithNumberParameter",
      parameters: ["number"],
      returnType: "number",
    },
    {
      name: "overloaded",
      returnType: "string",
      implementation: "overloadedNone",
    },
    {
      name: "overloaded",
      parameters: ["number"],
      returnType: "string",
      implementation: "overloadedNumber",
    },
    {
      name: "overloaded",
      parameters: ["string"],
      returnType: "string",
      implementation: "overloadedString",
    },
    {
      name: "overloaded",
      parameters: [Sample],
      returnType: "string",
      implementation: "overloadedSample",
    },
    { name: "failingMethod" },
    { name: "staticParameterlessMethod", isStatic: true },
    {
      name: "staticMethodWithStringParameter",
      parameters: ["string"],
      returnType: "string",
      isStatic: true,
    },
    {
      name: "staticOverloaded",
      returnType: "number",
      implementation: "staticOverloadedNone",
      isStatic: true,
    },
    {
      name: "staticOverloaded",
      parameters: ["number"],
      returnType: "number",
      implementation: "staticOverloadedNumber",
      isStatic: true,
    },
  ],
});

export const fixturesModule = defineModule({
  name: "fixtures",
  location: "types/test-fixtures.ts",
  types: [emptySampleType, sampleType],
});
