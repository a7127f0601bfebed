import {
  GetAccessKeyLastUsedCommand,
  GetAccountSummaryCommand,
  GetPolicyVersionCommand,
  ListAccessKeysCommand,
  ListAttachedRolePoliciesCommand,
  ListAttachedUserPoliciesCommand,
  ListPoliciesCommand,
  ListRolesCommand,
  ListUsersCommand,
  type IAMClient,
} from "@aws-sdk/client-iam";
import type { ResourceLister } from "../../scanner/types.js";
import type {
  AccessKeySnapshot,
  AccountSummarySnapshot,
  ManagedPolicySnapshot,
  PolicyStatement,
  PrincipalSnapshot,
} from "../../resources/types.js";
import { callAws, paginate, type AwsCallContext } from "./aws-call.js";

interface IamPage {
  readonly IsTruncated?: boolean;
  readonly Marker?: string;
}

function nextMarker(page: IamPage): string | undefined {
  return page.IsTruncated ? page.Marker : undefined;
}

export class AccountSummaryLister
  implements ResourceLister<AccountSummarySnapshot>
{
  readonly kind = "account-summary";

  constructor(
    private readonly client: IAMClient,
    private readonly context: AwsCallContext,
    private readonly accountId = "root",
  ) {}

  async *list(signal: AbortSignal): AsyncGenerator<AccountSummarySnapshot> {
    const response = await callAws(
      this.context,
      signal,
      "iam:GetAccountSummary",
      () =>
        this.client.send(new GetAccountSummaryCommand({}), {
          abortSignal: signal,
        }),
    );
    yield {
      resource_id: this.accountId,
      mfa_enabled: response.SummaryMap?.AccountMFAEnabled,
    };
  }
}

/** Customer managed policies, evaluated on their default version. */
export class ManagedPolicyLister
  implements ResourceLister<ManagedPolicySnapshot>
{
  readonly kind = "managed-policies";

  constructor(
    private readonly client: IAMClient,
    private readonly context: AwsCallContext,
  ) {}

  async *list(signal: AbortSignal): AsyncGenerator<ManagedPolicySnapshot> {
    const pages = paginate(
      (marker) =>
        callAws(this.context, signal, "iam:ListPolicies", () =>
          this.client.send(
            new ListPoliciesCommand({ Scope: "Local", Marker: marker }),
            { abortSignal: signal },
          ),
        ),
      nextMarker,
    );

    for await (const page of pages) {
      for (const policy of page.Policies ?? []) {
        if (!policy.PolicyName || !policy.Arn || !policy.DefaultVersionId) {
          continue;
        }
        const arn = policy.Arn;
        const versionId = policy.DefaultVersionId;
        const version = await callAws(
          this.context,
          signal,
          "iam:GetPolicyVersion",
          () =>
            this.client.send(
              new GetPolicyVersionCommand({ PolicyArn: arn, VersionId: versionId }),
              { abortSignal: signal },
            ),
        );
        const document = version.PolicyVersion?.Document;
        yield {
          resource_id: policy.PolicyName,
          arn,
          statements: document ? parsePolicyDocument(document, arn) : undefined,
        };
      }
    }
  }
}

export class AccessKeyLister implements ResourceLister<AccessKeySnapshot> {
  readonly kind = "access-keys";

  constructor(
    private readonly client: IAMClient,
    private readonly context: AwsCallContext,
  ) {}

  async *list(signal: AbortSignal): AsyncGenerator<AccessKeySnapshot> {
    for await (const userName of listUserNames(this.client, this.context, signal)) {
      const pages = paginate(
        (marker) =>
          callAws(this.context, signal, "iam:ListAccessKeys", () =>
            this.client.send(
              new ListAccessKeysCommand({ UserName: userName, Marker: marker }),
              { abortSignal: signal },
            ),
          ),
        nextMarker,
      );
      for await (const page of pages) {
        for (const key of page.AccessKeyMetadata ?? []) {
          if (!key.AccessKeyId) {
            continue;
          }
          const accessKeyId = key.AccessKeyId;
          const lastUsed = await callAws(
            this.context,
            signal,
            "iam:GetAccessKeyLastUsed",
            () =>
              this.client.send(
                new GetAccessKeyLastUsedCommand({ AccessKeyId: accessKeyId }),
                { abortSignal: signal },
              ),
          );
          yield {
            resource_id: accessKeyId,
            user_name: userName,
            status: key.Status,
            last_used_at: lastUsed.AccessKeyLastUsed?.LastUsedDate,
          };
        }
      }
    }
  }
}

/** IAM users followed by IAM roles, with their attached managed policies. */
export class PrincipalLister implements ResourceLister<PrincipalSnapshot> {
  readonly kind = "principals";

  constructor(
    private readonly client: IAMClient,
    private readonly context: AwsCallContext,
  ) {}

  async *list(signal: AbortSignal): AsyncGenerator<PrincipalSnapshot> {
    for await (const userName of listUserNames(this.client, this.context, signal)) {
      const pages = paginate(
        (marker) =>
          callAws(this.context, signal, "iam:ListAttachedUserPolicies", () =>
            this.client.send(
              new ListAttachedUserPoliciesCommand({
                UserName: userName,
                Marker: marker,
              }),
              { abortSignal: signal },
            ),
          ),
        nextMarker,
      );
      const names: string[] = [];
      for await (const page of pages) {
        names.push(...policyNames(page.AttachedPolicies));
      }
      yield {
        resource_id: userName,
        principal_type: "user",
        attached_policy_names: names,
      };
    }

    const rolePages = paginate(
      (marker) =>
        callAws(this.context, signal, "iam:ListRoles", () =>
          this.client.send(new ListRolesCommand({ Marker: marker }), {
            abortSignal: signal,
          }),
        ),
      nextMarker,
    );
    for await (const rolePage of rolePages) {
      for (const role of rolePage.Roles ?? []) {
        if (!role.RoleName) {
          continue;
        }
        const roleName = role.RoleName;
        const pages = paginate(
          (marker) =>
            callAws(this.context, signal, "iam:ListAttachedRolePolicies", () =>
              this.client.send(
                new ListAttachedRolePoliciesCommand({
                  RoleName: roleName,
                  Marker: marker,
                }),
                { abortSignal: signal },
              ),
            ),
          nextMarker,
        );
        const names: string[] = [];
        for await (const page of pages) {
          names.push(...policyNames(page.AttachedPolicies));
        }
        yield {
          resource_id: roleName,
          principal_type: "role",
          attached_policy_names: names,
        };
      }
    }
  }
}

async function* listUserNames(
  client: IAMClient,
  context: AwsCallContext,
  signal: AbortSignal,
): AsyncGenerator<string> {
  const pages = paginate(
    (marker) =>
      callAws(context, signal, "iam:ListUsers", () =>
        client.send(new ListUsersCommand({ Marker: marker }), {
          abortSignal: signal,
        }),
      ),
    nextMarker,
  );
  for await (const page of pages) {
    for (const user of page.Users ?? []) {
      if (user.UserName) {
        yield user.UserName;
      }
    }
  }
}

function policyNames(
  attached: readonly { PolicyName?: string }[] | undefined,
): string[] {
  return (attached ?? []).flatMap((policy) =>
    policy.PolicyName ? [policy.PolicyName] : [],
  );
}

/**
 * IAM returns policy documents URL-encoded. `Statement` may be a single
 * object or a list.
 */
export function parsePolicyDocument(
  document: string,
  policyArn: string,
): PolicyStatement[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(decodeURIComponent(document));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid policy document for ${policyArn}: ${reason}`);
  }
  if (!isRecord(parsed)) {
    throw new Error(`Invalid policy document for ${policyArn}: not an object`);
  }

  const raw = parsed.Statement;
  const statements: unknown[] = Array.isArray(raw)
    ? raw
    : raw === undefined
      ? []
      : [raw];
  return statements.filter(isRecord).map((statement) => ({
    effect: typeof statement.Effect === "string" ? statement.Effect : undefined,
    action: stringOrList(statement.Action),
    resource: stringOrList(statement.Resource),
  }));
}

function stringOrList(value: unknown): string | string[] | undefined {
  if (typeof value === "string") {
    return value;
  }
  if (Array.isArray(value)) {
    return value.filter((item): item is string => typeof item === "string");
  }
  return undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}
