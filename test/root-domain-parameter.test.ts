import * as cdk from "aws-cdk-lib";
import {
  parseRootDomain,
  resolveRootDomain,
} from "@/parameters/root-domain-parameter";

describe("parseRootDomain", () => {
  it("有効なドメイン名をそのまま返す", () => {
    expect(parseRootDomain("example.com")).toBe("example.com");
    expect(parseRootDomain("static.example.co.jp")).toBe("static.example.co.jp");
  });

  it("前後空白・大文字・末尾ドットを正規化する", () => {
    expect(parseRootDomain("  Example.COM. ")).toBe("example.com");
  });

  it("空文字はエラー", () => {
    expect(() => parseRootDomain("")).toThrow(
      'Invalid rootDomain "": rootDomain is empty'
    );
  });

  it("ワイルドカードはエラー", () => {
    expect(() => parseRootDomain("*.example.com")).toThrow(
      "rootDomain must not be a wildcard"
    );
  });

  it("ラベルが 1 つだけのものはエラー", () => {
    expect(() => parseRootDomain("localhost")).toThrow(
      "rootDomain needs at least two labels"
    );
  });

  it.each([
    "-bad.example.com",
    "bad-.example.com",
    "exa mple.com",
    "example..com",
    `${"a".repeat(64)}.com`,
  ])("不正なラベル %s はエラー", (value) => {
    expect(() => parseRootDomain(value)).toThrow(
      "rootDomain contains an invalid DNS label"
    );
  });

  it("文字列以外はエラー", () => {
    expect(() => parseRootDomain(123)).toThrow("Invalid rootDomain 123:");
  });
});

describe("resolveRootDomain", () => {
  const saved = process.env.ROOT_DOMAIN;

  afterEach(() => {
    if (saved === undefined) {
      delete process.env.ROOT_DOMAIN;
    } else {
      process.env.ROOT_DOMAIN = saved;
    }
  });

  it("CDK コンテキストの rootDomain を使う", () => {
    process.env.ROOT_DOMAIN = "from-env.example";
    const app = new cdk.App({ context: { rootDomain: "Example.com" } });

    expect(resolveRootDomain(app)).toBe("example.com");
  });

  it("コンテキストが無ければ ROOT_DOMAIN を使う", () => {
    process.env.ROOT_DOMAIN = "from-env.example";
    const app = new cdk.App();

    expect(resolveRootDomain(app)).toBe("from-env.example");
  });

  it("どちらも無ければエラー", () => {
    delete process.env.ROOT_DOMAIN;
    const app = new cdk.App();

    expect(() => resolveRootDomain(app)).toThrow("rootDomain is required.");
  });
});
