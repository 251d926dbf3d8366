import { Construct } from "constructs";
import {
  aws_cloudfront as cf,
  aws_route53 as r53,
  aws_route53_targets as targets,
} from "aws-cdk-lib";
import { AliasRecordProperty } from "@/parameters/website-parameter";

export interface AliasRecordConstructProps extends AliasRecordProperty {
  hostedZone: r53.IHostedZone;
  domainName: string;
  distribution: cf.IDistribution;
}

/**
 * エイリアス先の設定に EvaluateTargetHealth を付与するラッパー
 */
export class HealthEvaluatedTarget implements r53.IAliasRecordTarget {
  constructor(
    private readonly target: r53.IAliasRecordTarget,
    private readonly evaluateTargetHealth: boolean
  ) {}

  bind(record: r53.IRecordSet, zone?: r53.IHostedZone): r53.AliasRecordTargetConfig {
    return {
      ...this.target.bind(record, zone),
      evaluateTargetHealth: this.evaluateTargetHealth,
    };
  }
}

export class AliasRecordConstruct extends Construct {
  readonly aRecord: r53.ARecord;
  readonly aaaaRecord?: r53.AaaaRecord;

  constructor(scope: Construct, id: string, props: AliasRecordConstructProps) {
    super(scope, id);

    if (props.domainName.startsWith("*.")) {
      throw new Error(`Alias records cannot be created for wildcard name ${props.domainName}.`);
    }

    // Route53の recordName はゾーン相対にする（安全策）
    const zoneName = props.hostedZone.zoneName;
    const isApex = props.domainName === zoneName;
    if (!isApex && !props.domainName.endsWith(`.${zoneName}`)) {
      throw new Error(`${props.domainName} is not inside hosted zone ${zoneName}.`);
    }
    const relativeRecordName = isApex
      ? undefined
      : props.domainName.slice(0, -(zoneName.length + 1));

    const target = () =>
      r53.RecordTarget.fromAlias(
        new HealthEvaluatedTarget(
          new targets.CloudFrontTarget(props.distribution),
          props.evaluateTargetHealth
        )
      );

    // --- Route53: A（+ 任意で AAAA）のALIAS（CloudFront） ---
    this.aRecord = new r53.ARecord(this, "AliasA", {
      zone: props.hostedZone,
      recordName: relativeRecordName,
      target: target(),
    });

    if (props.ipv6) {
      this.aaaaRecord = new r53.AaaaRecord(this, "AliasAAAA", {
        zone: props.hostedZone,
        recordName: relativeRecordName,
        target: target(),
      });
    }
  }
}
