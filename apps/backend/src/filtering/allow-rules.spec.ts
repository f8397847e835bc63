import { InvalidInputException } from "../common/exceptions";
import {
  allowRuleFor,
  allowedDomainOf,
  allowedDomains,
  hasAllowRule,
  sameRules,
  validateRules,
} from "./allow-rules";

describe("allow rules", () => {
  it("builds the canonical allow rule", () => {
    expect(allowRuleFor("ads.example")).toBe("@@||ads.example^");
  });

  it.each([
    ["@@||ads.example^", "ads.example"],
    ["  @@||ADS.Example^  ", "ads.example"],
    ["@@||ads.example^$important", "ads.example"],
  ])("recognizes %j as an allow rule", (rule, domain) => {
    expect(allowedDomainOf(rule)).toBe(domain);
  });

  it.each([
    "||ads.example^",
    "@@||ads.example^$dnstype=AAAA",
    "@@/ads\\.example/",
    "! @@||ads.example^",
    "@@||ads.example",
  ])("does not treat %j as a plain allow rule", (rule) => {
    expect(allowedDomainOf(rule)).toBeUndefined();
  });

  it("matches an existing equivalent rule for a domain", () => {
    const rules = ["||ads.example^", "@@||ADS.example^$important"];

    expect(hasAllowRule(rules, "ads.example")).toBe(true);
    expect(hasAllowRule(rules, "other.example")).toBe(false);
  });

  it("lists allowed domains once each, in rule order", () => {
    expect(
      allowedDomains([
        "@@||b.example^",
        "||blocked.example^",
        "@@||a.example^",
        "@@||b.example^$important",
      ]),
    ).toEqual(["b.example", "a.example"]);
  });
});

describe("sameRules", () => {
  it("compares in order and exactly by default", () => {
    expect(sameRules(["a", "b"], ["a", "b"])).toBe(true);
    expect(sameRules(["a", "b"], ["b", "a"])).toBe(false);
    expect(sameRules(["a", ""], ["a"])).toBe(false);
  });

  it("ignores whitespace and blank lines when loose", () => {
    expect(sameRules(["a ", "", " b"], ["a", "b"], true)).toBe(true);
    expect(sameRules(["a"], ["a", "b"], true)).toBe(false);
  });
});

describe("validateRules", () => {
  it("returns the rules unchanged", () => {
    expect(validateRules(["||a.example^", "", "# comment"])).toEqual([
      "||a.example^",
      "",
      "# comment",
    ]);
  });

  it("rejects anything that is not an array", () => {
    expect(() => validateRules("||a.example^")).toThrow(
      new InvalidInputException("rules must be an array of strings"),
    );
  });

  it("rejects non-string entries", () => {
    expect(() => validateRules(["ok", 3])).toThrow("rules[1] must be a string");
  });

  it("rejects entries spanning several lines", () => {
    expect(() => validateRules(["||a.example^\n||b.example^"])).toThrow(
      "rules[0] must be a single line",
    );
  });
});
