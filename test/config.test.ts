import { InvalidArgumentError } from "commander";
import {
  batchSizeParser,
  loadEnvironment,
  parseList,
  parseNonNegativeInt,
  parseNumber,
  parsePositiveInt,
  parsePositiveNumber,
} from "../lib/config.js";

describe("loadEnvironment", () => {
  test("fills in defaults", () => {
    expect(loadEnvironment({})).toEqual({
      AWS_REGION: "us-east-1",
      CHECKPOINT_FILE: "dynamodb_insert_progress.json",
    });
  });

  test("reads the table, region and endpoint", () => {
    expect(
      loadEnvironment({ TABLE_NAME: "maps", AWS_REGION: "eu-west-1", DYNAMODB_ENDPOINT: "http://localhost:8000" }),
    ).toMatchObject({ TABLE_NAME: "maps", AWS_REGION: "eu-west-1", DYNAMODB_ENDPOINT: "http://localhost:8000" });
  });

  test("rejects an endpoint that is not a URL", () => {
    expect(() => loadEnvironment({ DYNAMODB_ENDPOINT: "localhost" })).toThrow(/^Invalid environment: DYNAMODB_ENDPOINT: /);
  });
});

describe("option parsers", () => {
  test("integers", () => {
    expect(parsePositiveInt("25")).toBe(25);
    expect(() => parsePositiveInt("0")).toThrow(InvalidArgumentError);
    expect(() => parsePositiveInt("2.5")).toThrow("Not a positive integer.");
    expect(parseNonNegativeInt("0")).toBe(0);
    expect(() => parseNonNegativeInt("-1")).toThrow("Not a non-negative integer.");
  });

  test("numbers", () => {
    expect(parsePositiveNumber("0.5")).toBe(0.5);
    expect(() => parsePositiveNumber("0")).toThrow("Not a positive number.");
    expect(parseNumber("-1")).toBe(-1);
    expect(() => parseNumber(" ")).toThrow("Not a number.");
    expect(() => parseNumber("ten")).toThrow("Not a number.");
  });

  test("batch sizes are capped at the request limit", () => {
    const parse = batchSizeParser(25);
    expect(parse("25")).toBe(25);
    expect(() => parse("26")).toThrow("At most 25 items fit in one request.");
  });

  test("lists drop blanks", () => {
    expect(parseList("SWAP, ADD_LIQUIDITY,,")).toEqual(["SWAP", "ADD_LIQUIDITY"]);
  });
});
