export function deployedComment(hostname: string): string {
  return `## Preview Environment Deployed Successfully! 🚀

Your preview environment is now available at:
**https://${hostname}**

Note: Initial deployment may take 3-5 minutes for CloudFront to propagate globally.`;
}

export function cleanedUpComment(environmentKey: number): string {
  return `## Preview Environment Cleanup Complete 🧹

The preview environment for PR #${environmentKey} has been successfully cleaned up.

All resources have been removed:
- CloudFront distribution
- Route53 DNS records
- S3 bucket and contents`;
}
