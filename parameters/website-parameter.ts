import * as cdk from "aws-cdk-lib";
import { aws_cloudfront as cf } from "aws-cdk-lib";
import { EdgeCertProperty } from "@/parameters/edge-cert-parameter";

export type ManagedCachePolicyName =
  | "CACHING_OPTIMIZED"
  | "CACHING_OPTIMIZED_FOR_UNCOMPRESSED_OBJECTS"
  | "CACHING_DISABLED";

export interface BucketProperty {
  bucketName?: string;
  indexDocument: string;
  autoDeleteObjects: boolean;
}

export interface ContentsDeliveryProperty {
  domainName: string;
  cachePolicy: ManagedCachePolicyName;
  minimumProtocolVersion: cf.SecurityPolicyProtocol;
  priceClass: cf.PriceClass;
}

export interface AliasRecordProperty {
  evaluateTargetHealth: boolean;
  ipv6: boolean;
}

export interface WebsiteProperty {
  contentsDelivery: Omit<ContentsDeliveryProperty, "domainName">;
  bucket: BucketProperty;
  aliasRecord: AliasRecordProperty;
  certificate: Omit<EdgeCertProperty, "certificateDomainName">;
}

export interface WebSiteStackProperty {
  env: cdk.Environment;
  props: WebsiteProperty;
}

export const websiteStackProperty: WebSiteStackProperty = {
  env: {
    account: process.env.CDK_DEFAULT_ACCOUNT,
    region: "us-east-1", // 証明書と Distribution を同じスタックに置くため us-east-1 固定
  },
  props: {
    contentsDelivery: {
      cachePolicy: "CACHING_OPTIMIZED",
      minimumProtocolVersion: cf.SecurityPolicyProtocol.TLS_V1_2_2021,
      priceClass: cf.PriceClass.PRICE_CLASS_ALL,
    },
    bucket: {
      // bucketName 未指定時は rootDomain をバケット名にする
      indexDocument: "index.html",
      autoDeleteObjects: true,
    },
    aliasRecord: {
      evaluateTargetHealth: true,
      ipv6: false,
    },
    certificate: {
      includeWildcard: true, // *.rootDomain を SAN に含める
    },
  },
};
