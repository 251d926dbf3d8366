import { Construct } from "constructs";
import { z } from "zod";

// DNS ラベル: 1〜63 文字の英小文字・数字・ハイフン（先頭と末尾のハイフンは不可）
const DNS_LABEL = /^(?!-)[a-z0-9-]{1,63}(?<!-)$/;

// 正規化（前後空白・大文字・末尾ドット）してから検証する
export const rootDomainSchema = z
  .string()
  .trim()
  .toLowerCase()
  .transform((s) => s.replace(/\.$/, ""))
  .pipe(
    z
      .string()
      .min(1, "rootDomain is empty")
      .max(253, "rootDomain is longer than 253 characters")
      .refine((s) => !s.includes("*"), "rootDomain must not be a wildcard")
      .refine(
        (s) => s.split(".").length >= 2,
        "rootDomain needs at least two labels",
      )
      .refine(
        (s) => s.split(".").every((label) => DNS_LABEL.test(label)),
        "rootDomain contains an invalid DNS label",
      ),
  );

export type RootDomain = z.output<typeof rootDomainSchema>;

export const parseRootDomain = (raw: unknown): RootDomain => {
  const res = rootDomainSchema.safeParse(raw);
  if (!res.success) {
    const msg = res.error.issues[0]?.message ?? "invalid value";
    throw new Error(`Invalid rootDomain ${JSON.stringify(raw)}: ${msg}`);
  }
  return res.data;
};

/**
 * 配信するルートドメインを解決する
 *
 * - CDK コンテキスト `rootDomain`（`-c rootDomain=example.com` / cdk.json）
 * - 無ければ環境変数 `ROOT_DOMAIN`
 * - どちらも無い場合はエラー（synth を止める）
 */
export const resolveRootDomain = (scope: Construct): RootDomain => {
  const fromContext: unknown = scope.node.tryGetContext("rootDomain");
  const raw = fromContext ?? process.env.ROOT_DOMAIN;
  if (raw === undefined) {
    throw new Error(
      "rootDomain is required. Pass -c rootDomain=<domain> or set ROOT_DOMAIN.",
    );
  }
  return parseRootDomain(raw);
};
