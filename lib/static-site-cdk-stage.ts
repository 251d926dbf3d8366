import * as cdk from "aws-cdk-lib";
import { Construct } from "constructs";

import { DnsStack } from "@/lib/stacks/dns-stack";
import { WebsiteStack } from "@/lib/stacks/website-stack";

import { dnsStackProperty } from "@/parameters/dns-parameter";
import { websiteStackProperty } from "@/parameters/website-parameter";
import { RootDomain } from "@/parameters/root-domain-parameter";

export interface StaticSiteCdkStageProps extends cdk.StageProps {
  rootDomain: RootDomain;
}

export class StaticSiteCdkStage extends cdk.Stage {
  public readonly dnsStack: DnsStack;
  public readonly websiteStack: WebsiteStack;

  constructor(scope: Construct, id: string, props: StaticSiteCdkStageProps) {
    super(scope, id, props);

    // DNS（Hosted Zone）の参照
    this.dnsStack = new DnsStack(this, "DnsStack", {
      ...dnsStackProperty,
      zoneName: props.rootDomain,
    });

    // Website（ACM + S3 + CloudFront + Route53、us-east-1）
    // ゾーン ID / 名前は synth 時に確定する値なので、スタック間参照は発生しない
    this.websiteStack = new WebsiteStack(this, "WebsiteStack", {
      ...websiteStackProperty,
      domainName: props.rootDomain,
      hostedZoneRef: this.dnsStack.hostedZoneRef,
    });
  }
}
