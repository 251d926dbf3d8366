import { Construct } from "constructs";
import { EdgeCertProperty } from "@/parameters/edge-cert-parameter";
import { aws_certificatemanager as acm, aws_route53 as r53 } from "aws-cdk-lib";

export interface CertificateConstructProps extends EdgeCertProperty {
  hostedZone?: r53.IHostedZone;
}

/**
 * ACM証明書を「新規作成」または「既存参照」するためのコンストラクト
 * - certificateArn があれば既存参照
 * - なければ certificateDomainName（+ ワイルドカード SAN）で新規作成し、DNS 検証する
 *
 * DNS 検証は CloudFormation の証明書リソースが担う:
 * - 検証用 CNAME を hostedZone に書き込む（同名レコードは上書き）
 * - ISSUED になるまでリソース作成が完了しないため、ARN を参照する側は発行後に作られる
 * - ドメイン変更時は置換（新しい証明書の発行後に旧証明書を削除）
 */
export class CertificateConstruct extends Construct {
  readonly certificate: acm.ICertificate;

  constructor(scope: Construct, id: string, props: CertificateConstructProps) {
    super(scope, id);

    // 既存ARNがある：それを参照
    if (props.certificateArn) {
      this.certificate = acm.Certificate.fromCertificateArn(
        this,
        "ExistingCert",
        props.certificateArn
      );
      return;
    }

    // 新規発行なら domain と hostedZone が必須
    if (!props.certificateDomainName || !props.hostedZone) {
      throw new Error(
        "certificateDomainName and hostedZone are required to create a new certificate."
      );
    }
    if (props.certificateDomainName.startsWith("*.")) {
      throw new Error(
        "certificateDomainName must be the root domain; the wildcard is added with includeWildcard."
      );
    }

    const subjectAlternativeNames = props.includeWildcard
      ? [`*.${props.certificateDomainName}`]
      : undefined;

    // DNS検証：Route53 に検証用CNAMEを自動作成
    this.certificate = new acm.Certificate(this, "Certificate", {
      domainName: props.certificateDomainName,
      subjectAlternativeNames,
      validation: acm.CertificateValidation.fromDns(props.hostedZone),
    });
  }
}
