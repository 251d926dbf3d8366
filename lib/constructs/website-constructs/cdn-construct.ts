import { Construct } from "constructs";
import {
  aws_certificatemanager as acm,
  aws_cloudfront as cf,
  aws_cloudfront_origins as origins,
  aws_s3 as s3,
} from "aws-cdk-lib";
import {
  ContentsDeliveryProperty,
  ManagedCachePolicyName,
} from "@/parameters/website-parameter";

export interface CdnConstructProps extends ContentsDeliveryProperty {
  contentBucket: s3.IBucket;
  certificate: acm.ICertificate;
  indexDocument: string;
}

// CloudFront マネージドキャッシュポリシー（名前 → 参照）
const MANAGED_CACHE_POLICIES: Record<ManagedCachePolicyName, cf.ICachePolicy> = {
  CACHING_OPTIMIZED: cf.CachePolicy.CACHING_OPTIMIZED,
  CACHING_OPTIMIZED_FOR_UNCOMPRESSED_OBJECTS:
    cf.CachePolicy.CACHING_OPTIMIZED_FOR_UNCOMPRESSED_OBJECTS,
  CACHING_DISABLED: cf.CachePolicy.CACHING_DISABLED,
};

export class CdnConstruct extends Construct {
  readonly originAccessControl: cf.S3OriginAccessControl;
  readonly distribution: cf.Distribution;

  constructor(scope: Construct, id: string, props: CdnConstructProps) {
    super(scope, id);

    // OAC: 常に SigV4 で署名してオリジン(S3)へアクセス
    this.originAccessControl = new cf.S3OriginAccessControl(this, "OriginAccessControl", {
      description: `Signs origin requests to the ${props.domainName} content bucket`,
      signing: cf.Signing.SIGV4_ALWAYS,
    });

    // S3 オリジン（バケットポリシーに AWS:SourceArn 条件付きの s3:GetObject を追加）
    const origin = origins.S3BucketOrigin.withOriginAccessControl(props.contentBucket, {
      originAccessControl: this.originAccessControl,
      originAccessLevels: [cf.AccessLevel.READ],
    });

    // CloudFront Distribution
    this.distribution = new cf.Distribution(this, "Distribution", {
      defaultBehavior: {
        origin,                                                            // OACでS3を私的アクセス
        viewerProtocolPolicy: cf.ViewerProtocolPolicy.REDIRECT_TO_HTTPS,   // HTTP→HTTPS
        allowedMethods: cf.AllowedMethods.ALLOW_GET_HEAD,                  // GET/HEAD のみ
        cachedMethods: cf.CachedMethods.CACHE_GET_HEAD,
        cachePolicy: MANAGED_CACHE_POLICIES[props.cachePolicy],            // マネージドキャッシュポリシー
        compress: true,                                                    // 自動圧縮
      },
      defaultRootObject: props.indexDocument,                              // ルート(/)はインデックス
      certificate: props.certificate,                                      // TLS終端
      domainNames: [props.domainName],                                     // ALTN(CNAME)
      sslSupportMethod: cf.SSLMethod.SNI,                                  // SNI のみ
      minimumProtocolVersion: props.minimumProtocolVersion,                // TLS最低バージョン
      priceClass: props.priceClass,
      // geoRestriction は指定しない（地域制限なし）
    });
  }
}
