export interface EdgeCertProperty {
  certificateDomainName?: string;
  includeWildcard?: boolean;
  certificateArn?: string;
}
