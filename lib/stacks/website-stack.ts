import * as cdk from "aws-cdk-lib";
import { Construct } from "constructs";
import { aws_route53 as r53 } from "aws-cdk-lib";
import { WebSiteStackProperty } from "@/parameters/website-parameter";
import { HostedZoneRef } from "@/lib/stacks/dns-stack";
import { CertificateConstruct } from "@/lib/constructs/edge-cert-construct/certificate-construct";
import { BucketConstruct } from "@/lib/constructs/website-constructs/bucket-construct";
import { CdnConstruct } from "@/lib/constructs/website-constructs/cdn-construct";
import { AliasRecordConstruct } from "@/lib/constructs/dns-construct/alias-record-construct";

export interface WebsiteStackProps
  extends cdk.StackProps,
    Omit<WebSiteStackProperty, "env"> {
  domainName: string;
  hostedZoneRef: HostedZoneRef;
}

/**
 * 証明書・S3・CloudFront・Route53 をひとつのスタックにまとめる
 *
 * 証明書を置き換えると、同じ更新の中で Distribution が新しい ARN に切り替わり、
 * 旧証明書はクリーンアップ段階で削除される。
 */
export class WebsiteStack extends cdk.Stack {
  public readonly certificateArn: string;
  public readonly bucketName: string;
  public readonly distributionId: string;
  public readonly distributionDomainName: string;

  constructor(scope: Construct, id: string, props: WebsiteStackProps) {
    super(scope, id, props);

    // CloudFront は us-east-1 の証明書しか受け付けない（このスタックのデプロイだけを止める）
    if (!cdk.Token.isUnresolved(this.region) && this.region !== "us-east-1") {
      cdk.Annotations.of(this).addError(
        `WebsiteStack must be deployed in us-east-1 (current region: ${this.region}).`
      );
    }

    // Route53: DnsStack のゾーンを参照
    const zone = r53.PublicHostedZone.fromHostedZoneAttributes(
      this,
      "ImportedZone",
      {
        hostedZoneId: props.hostedZoneRef.hostedZoneId,
        zoneName: props.hostedZoneRef.zoneName,
      }
    );

    // ACM: CloudFront用証明書（新規発行 or 既存参照）
    const cert = new CertificateConstruct(this, "CertificateConstruct", {
      ...props.props.certificate,
      certificateDomainName: props.domainName,
      hostedZone: zone,
    }).certificate;

    // S3: 配信用バケット（名前はドメイン）
    const contentBucket = new BucketConstruct(this, "BucketConstruct", {
      ...props.props.bucket,
      bucketName: props.props.bucket.bucketName ?? props.domainName,
    }).bucket;

    // CloudFront: OAC + CDN構築
    const cdn = new CdnConstruct(this, "CdnConstruct", {
      ...props.props.contentsDelivery,
      domainName: props.domainName,
      contentBucket,
      certificate: cert,
      indexDocument: props.props.bucket.indexDocument,
    });

    // Route53: ドメイン → CloudFront のエイリアス
    new AliasRecordConstruct(this, "AliasRecordConstruct", {
      ...props.props.aliasRecord,
      hostedZone: zone,
      domainName: props.domainName,
      distribution: cdn.distribution,
    });

    this.certificateArn = cert.certificateArn;
    this.bucketName = contentBucket.bucketName;
    this.distributionId = cdn.distribution.distributionId;
    this.distributionDomainName = cdn.distribution.domainName;

    // --- 結果出力 ---
    new cdk.CfnOutput(this, "SiteDomain", {
      value: props.domainName,
      exportName: `${cdk.Stack.of(this).stackName}-SiteDomain`,
    });

    new cdk.CfnOutput(this, "CertificateArn", {
      value: this.certificateArn,
      exportName: `${cdk.Stack.of(this).stackName}-CertificateArn`,
    });

    new cdk.CfnOutput(this, "DistributionId", {
      value: this.distributionId,
      exportName: `${cdk.Stack.of(this).stackName}-DistributionId`,
    });

    new cdk.CfnOutput(this, "DistributionDomainName", {
      value: this.distributionDomainName,
      exportName: `${cdk.Stack.of(this).stackName}-DistributionDomainName`,
    });

    new cdk.CfnOutput(this, "ContentBucketName", {
      value: this.bucketName,
      exportName: `${cdk.Stack.of(this).stackName}-ContentBucketName`,
    });
  }
}
