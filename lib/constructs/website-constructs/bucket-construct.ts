import { Construct } from "constructs";
import { Annotations, aws_s3 as s3, RemovalPolicy } from "aws-cdk-lib";
import { BucketProperty } from "@/parameters/website-parameter";

export interface BucketConstructProps extends BucketProperty {}

export class BucketConstruct extends Construct {
  readonly bucket: s3.Bucket;

  constructor(scope: Construct, id: string, props: BucketConstructProps) {
    super(scope, id);

    if (props.autoDeleteObjects) {
      Annotations.of(this).addInfo(
        "Content bucket is destroyed together with its objects when the stack is deleted."
      );
    }

    this.bucket = new s3.Bucket(this, "Bucket", {
      bucketName: props.bucketName,                              // バケット名（= ルートドメイン）
      websiteIndexDocument: props.indexDocument,                 // 静的サイトのインデックス

      blockPublicAccess: s3.BlockPublicAccess.BLOCK_ALL,         // 公開アクセスをブロック（読み取りは CloudFront のみ）
      enforceSSL: true,                                          // SSL 強制
      encryption: s3.BucketEncryption.S3_MANAGED,                // サーバー側暗号化（SSE-S3）
      objectOwnership: s3.ObjectOwnership.BUCKET_OWNER_ENFORCED, // ACLを無効化して所有権をバケット側に強制

      versioned: false,                                          // バージョニングはオフ

      removalPolicy: props.autoDeleteObjects
        ? RemovalPolicy.DESTROY                                  // Destroy 方針
        : RemovalPolicy.RETAIN,                                  // 中身ごと残す
      autoDeleteObjects: props.autoDeleteObjects,                // Destroy 時に中身も消す
    });
  }
}
