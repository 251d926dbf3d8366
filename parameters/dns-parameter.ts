import * as cdk from "aws-cdk-lib";

export interface HostZoneProperty {
  zoneName?: string;
  hostedZoneId?: string;
}

export interface DnsStackProperty {
  env: cdk.Environment;
  props: { hostedZone: Omit<HostZoneProperty, "zoneName"> };
}

export const dnsStackProperty: DnsStackProperty = {
  env: {
    account: process.env.CDK_DEFAULT_ACCOUNT,
    region: process.env.CDK_DEFAULT_REGION,
  },
  props: {
    // ゾーン名は rootDomain から決まる。ID を固定したい場合のみ hostedZoneId を指定
    hostedZone: {},
  },
};
