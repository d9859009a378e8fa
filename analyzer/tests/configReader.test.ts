import * as path from "path";

import {
  getProductConfig,
  loadProductsConfig,
  parseProductsConfig,
  parseProductsYaml,
  validateProductsConfig,
} from "../src/config/reader";
import { ConfigParseError, ConfigurationError } from "../src/errors";
import { DEFAULT_IGNORE_RULES } from "../src/rules/ignoreRule";

const fixturePath = path.join(__dirname, "test-data", "products.yaml");

function expectConfigurationError(build: () => unknown, field: string): void {
  try {
    build();
  } catch (error) {
    expect(error).toBeInstanceOf(ConfigurationError);
    if (error instanceof ConfigurationError) {
      expect(error.field).toBe(field);
    }
    return;
  }
  throw new Error("expected a configuration error");
}

describe("Products configuration", () => {
  test("should load products, channels and rules from YAML", async () => {
    const config = await loadProductsConfig(fixturePath);

    expect(config.timezone).toBe("Europe/Rome");
    expect(config.businessHours).toEqual({ start: 9, end: 18 });
    expect([...config.products.keys()]).toEqual(["SEND", "INTEROP"]);

    const send = getProductConfig(config, "SEND");
    expect(send.environments.get("uat")).toEqual({
      name: "uat",
      channelReference: "C-UAT",
    });
    expect(send.oncall).toEqual({
      channelReference: "C-ONCALL",
      pattern: "^oncall-",
    });
    expect(send.ignoreRules).toHaveLength(2);

    const [batch, disk] = send.ignoreRules;
    expect(batch.path).toBe("attachments.title.alarm_name");
    expect(batch.reason).toBe("Nightly batch");
    expect(batch.validity.hours[0].start).toBe(79200);
    expect(batch.validity.timezone).toBe("Europe/Rome");
    expect(disk.path).toBe("*");
    expect(disk.environments).toEqual(["uat"]);
    expect(disk.exclusions.toString()).toBe(
      "TimeConstraint(periods=[2025-12-24 00:00:00 → 2025-12-26 00:00:00])",
    );
  });

  test("should use the default rules when a product lists none", async () => {
    const config = await loadProductsConfig(fixturePath);
    expect(getProductConfig(config, "INTEROP").ignoreRules).toBe(
      DEFAULT_IGNORE_RULES,
    );
  });

  test("should keep an explicit empty rule list", () => {
    const config = parseProductsYaml(
      "products:\n  SEND:\n    envs:\n      prod:\n        slack_channel_id: C1\n    alarms:\n      ignore: []\n",
      "inline.yaml",
    );
    expect(getProductConfig(config, "SEND").ignoreRules).toEqual([]);
  });

  test("should apply defaults for timezone and business hours", () => {
    const config = parseProductsConfig({ products: {} });
    expect(config.timezone).toBe("Europe/Rome");
    expect(config.businessHours).toEqual({ start: 9, end: 18 });
  });

  test("should reject products without extractor", () => {
    expect(() =>
      parseProductsConfig({ products: { BILLING: { envs: {} } } }),
    ).toThrow("No message extractor available for product 'BILLING'");
  });

  test("should evaluate rule bounds in the overriding timezone", () => {
    const data = {
      products: {
        SEND: {
          alarms: {
            ignore: [
              { name: "Disk", validity: { hours: [{ start: "00:00", end: "00:59" }] } },
            ],
          },
        },
      },
    };
    const at = new Date("2025-01-15T00:30:00Z");

    const fromFile = getProductConfig(parseProductsConfig(data), "SEND");
    expect(fromFile.ignoreRules[0].isValidAt(at)).toBe(false);

    const config = parseProductsConfig(data, "<inline>", "UTC");
    expect(config.timezone).toBe("UTC");
    const [rule] = getProductConfig(config, "SEND").ignoreRules;
    expect(rule.validity.timezone).toBe("UTC");
    expect(rule.isValidAt(at)).toBe(true);
  });

  test("should apply the timezone override when loading from file", async () => {
    const config = await loadProductsConfig(fixturePath, "UTC");
    expect(config.timezone).toBe("UTC");
    const [batch] = getProductConfig(config, "SEND").ignoreRules;
    expect(batch.validity.timezone).toBe("UTC");
  });

  test("should reject an unknown overriding timezone", () => {
    expectConfigurationError(
      () => parseProductsConfig({ products: {} }, "<inline>", "Mars/Base"),
      "timezone",
    );
  });

  test("should name the YAML key of an empty rule name", () => {
    expectConfigurationError(
      () =>
        parseProductsConfig({
          products: { SEND: { alarms: { ignore: [{ name: "" }] } } },
        }),
      "products.SEND.alarms.ignore[0].name",
    );
  });

  test("should report the field of a malformed rule", () => {
    expectConfigurationError(
      () =>
        parseProductsConfig({
          products: {
            SEND: { alarms: { ignore: [{ name: "x", path: "blocks.text" }] } },
          },
        }),
      "products.SEND.alarms.ignore[0].path",
    );
    expectConfigurationError(
      () =>
        parseProductsConfig({
          products: {
            SEND: {
              alarms: {
                ignore: [{ name: "ok" }, { name: "x", validity: { weekdays: ["funday"] } }],
              },
            },
          },
        }),
      "products.SEND.alarms.ignore[1].validity.weekdays",
    );
    expectConfigurationError(
      () =>
        parseProductsConfig({
          products: {
            SEND: {
              alarms: {
                ignore: [
                  {
                    name: "x",
                    exclusions: { periods: [{ start: "2025-02-01", end: "2025-01-01" }] },
                  },
                ],
              },
            },
          },
        }),
      "products.SEND.alarms.ignore[0].exclusions.periods",
    );
  });

  test("should reject an invalid on-call pattern", () => {
    expectConfigurationError(
      () =>
        parseProductsConfig({
          products: {
            SEND: { oncall: { slack_channel_id: "C2", pattern: "(" } },
          },
        }),
      "products.SEND.oncall.pattern",
    );
  });

  test("should reject an unknown timezone and invalid business hours", () => {
    expect(() =>
      parseProductsConfig({ timezone: "Mars/Olympus", products: {} }),
    ).toThrow("Unknown timezone 'Mars/Olympus'");
    expectConfigurationError(
      () => parseProductsConfig({ business_hours: { start: 18, end: 9 }, products: {} }),
      "business_hours",
    );
  });

  test("should report schema errors with file and field", () => {
    try {
      parseProductsYaml("products: 5\n", "broken.yaml");
      throw new Error("expected a parse error");
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigParseError);
      if (error instanceof ConfigParseError) {
        expect(error.filePath).toBe("broken.yaml");
        expect(error.field).toBe("products");
        expect(error.message).toContain("(in broken.yaml)");
      }
    }
  });

  test("should reject malformed YAML and missing files", async () => {
    expect(() => parseProductsYaml("products: [unclosed\n", "bad.yaml")).toThrow(
      ConfigParseError,
    );
    expect(() => parseProductsYaml("just text\n", "bad.yaml")).toThrow(
      "YAML root must be an object",
    );
    await expect(
      loadProductsConfig(path.join(__dirname, "test-data", "missing.yaml")),
    ).rejects.toThrow(ConfigParseError);
  });

  test("should reject unknown products on lookup", async () => {
    const config = await loadProductsConfig(fixturePath);
    expect(() => getProductConfig(config, "BILLING")).toThrow(
      "Unknown product 'BILLING'. Expected one of: SEND, INTEROP",
    );
  });

  test("should list non-fatal problems", () => {
    const config = parseProductsConfig({
      products: {
        SEND: { envs: { prod: {} } },
        INTEROP: {},
      },
    });
    expect(validateProductsConfig(config)).toEqual([
      "Product 'SEND', environment 'prod' has empty slack_channel_id",
      "Product 'INTEROP' has no environments defined",
    ]);
  });
});
