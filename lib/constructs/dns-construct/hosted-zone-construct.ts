import { Construct } from "constructs";
import { Annotations, aws_route53 as r53 } from "aws-cdk-lib";
import { HostZoneProperty } from "@/parameters/dns-parameter";

export interface HostedZoneConstructProps extends HostZoneProperty {}

/**
 * Route 53 の「公開 Hosted Zone」を 新規作成せずに参照(import)する ためのコンストラクト
 *
 * - `zoneName` は必須（ルートドメイン）
 * - `hostedZoneId` もあれば **ID + 名前で参照**（lookup 不要で安定）
 * - 無ければ **fromLookup で参照**（公開ゾーンを名前で検索）
 *
 * 補足:
 * - fromLookup は `cdk synth` 時にアカウントへ問い合わせ、`cdk.context.json` に結果がキャッシュされる。
 *   一致するゾーンが 0 件 / 複数件の場合は synth が失敗する。
 * - ゾーンの作成・削除は行わない。
 */
export class HostedZoneConstruct extends Construct {
  readonly hostedZone: r53.IPublicHostedZone;

  constructor(scope: Construct, id: string, props: HostedZoneConstructProps) {
    super(scope, id);

    if (!props.zoneName) {
      throw new Error("zoneName is required.");
    }

    // 優先: hostedZoneId（"/hostedzone/" 付きでも受け付ける）
    if (props.hostedZoneId) {
      this.hostedZone = r53.PublicHostedZone.fromPublicHostedZoneAttributes(
        this,
        "HostedZone",
        {
          hostedZoneId: props.hostedZoneId.replace(/^\/hostedzone\//, ""),
          zoneName: props.zoneName,
        }
      );
      return;
    }

    // 代替: zoneName（lookupで既存の公開ゾーンを検索）
    Annotations.of(this).addInfo(
      `Hosted zone ${props.zoneName} is resolved by lookup; run "cdk context --clear" if the zone is recreated.`
    );
    this.hostedZone = r53.PublicHostedZone.fromLookup(this, "HostedZone", {
      domainName: props.zoneName,
      privateZone: false,
    });
  }
}
