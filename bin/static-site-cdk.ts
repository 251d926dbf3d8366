#!/usr/bin/env node
import * as cdk from "aws-cdk-lib";
import { StaticSiteCdkStage } from "@/lib/static-site-cdk-stage";
import { resolveRootDomain } from "@/parameters/root-domain-parameter";

const app = new cdk.App();

new StaticSiteCdkStage(app, "StaticSite", {
  rootDomain: resolveRootDomain(app),
});
