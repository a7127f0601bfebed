import { Severity, type Rule } from "../scanner/types.js";
import type { BucketSnapshot } from "../resources/types.js";

export const ALL_USERS_URI = "http://acs.amazonaws.com/groups/global/AllUsers";

export const BUCKET_RULES: readonly Rule<BucketSnapshot>[] = [
  {
    id: "public-acl",
    title: "Bucket ACL grants public access",
    severity: Severity.High,
    message: "S3 bucket {resource_id} ACL grants access to all users.",
    predicate: (bucket) =>
      (bucket.acl_grants ?? []).some(
        (grant) => grant.grantee_uri === ALL_USERS_URI,
      ),
    remediation: "Remove the AllUsers grant and enable Block Public Access.",
  },
  {
    id: "public-policy",
    title: "Bucket policy allows public access",
    severity: Severity.High,
    message: "S3 bucket {resource_id} policy allows public access.",
    predicate: (bucket) => bucket.policy_status?.is_public === true,
    remediation: "Remove wildcard principals from the bucket policy.",
  },
  {
    id: "no-default-encryption",
    title: "Bucket has no default encryption",
    severity: Severity.Warning,
    message: "S3 bucket {resource_id} has no server-side encryption configured.",
    predicate: (bucket) => (bucket.encryption ?? []).length === 0,
    remediation: "Enable default encryption with SSE-S3 or SSE-KMS.",
  },
  {
    id: "versioning-disabled",
    title: "Bucket versioning is not enabled",
    severity: Severity.Info,
    message: "S3 bucket {resource_id} versioning is not enabled.",
    predicate: (bucket) => bucket.versioning !== "Enabled",
    remediation: "Enable versioning to recover from overwrites and deletions.",
  },
];
