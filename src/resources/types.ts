import type { ResourceSnapshot } from "../scanner/types.js";

export interface InstanceSnapshot extends ResourceSnapshot {
  readonly public_ip?: string;
  readonly state?: string;
  readonly name?: string;
}

export interface AccountSummarySnapshot extends ResourceSnapshot {
  /** `AccountMFAEnabled` from the IAM account summary; 1 when enabled. */
  readonly mfa_enabled?: number;
}

export interface PolicyStatement {
  readonly effect?: string;
  readonly action?: string | readonly string[];
  readonly resource?: string | readonly string[];
}

export interface ManagedPolicySnapshot extends ResourceSnapshot {
  readonly arn?: string;
  readonly statements?: readonly PolicyStatement[];
}

export interface AccessKeySnapshot extends ResourceSnapshot {
  readonly user_name: string;
  readonly status?: string;
  readonly last_used_at?: Date;
}

export type PrincipalType = "user" | "role";

export interface PrincipalSnapshot extends ResourceSnapshot {
  readonly principal_type: PrincipalType;
  readonly attached_policy_names?: readonly string[];
}

export interface FunctionSnapshot extends ResourceSnapshot {
  readonly kms_key_arn?: string;
  readonly reserved_concurrency?: number;
  readonly has_resource_policy?: boolean;
}

export interface DatabaseSnapshot extends ResourceSnapshot {
  readonly engine?: string;
  readonly publicly_accessible?: boolean;
  readonly storage_encrypted?: boolean;
  readonly backup_retention_period?: number;
}

export interface AclGrant {
  readonly grantee_uri?: string;
  readonly permission?: string;
}

export interface BucketSnapshot extends ResourceSnapshot {
  readonly acl_grants?: readonly AclGrant[];
  readonly policy_status?: { readonly is_public?: boolean };
  /** SSE algorithms of the default encryption rules; absent when not configured. */
  readonly encryption?: readonly string[];
  readonly versioning?: string;
}

export interface IngressRangeSnapshot extends ResourceSnapshot {
  readonly group_name?: string;
  readonly protocol?: string;
  readonly cidr?: string;
  /** Absent when the rule covers every port. */
  readonly from_port?: number;
  readonly to_port?: number;
  readonly port_range?: string;
}
