import {
  GetFunctionConcurrencyCommand,
  GetPolicyCommand,
  ListFunctionsCommand,
  type LambdaClient,
} from "@aws-sdk/client-lambda";
import type { ResourceLister } from "../../scanner/types.js";
import type { FunctionSnapshot } from "../../resources/types.js";
import {
  callAws,
  isAwsError,
  paginate,
  type AwsCallContext,
} from "./aws-call.js";

export class FunctionLister implements ResourceLister<FunctionSnapshot> {
  readonly kind = "functions";

  constructor(
    private readonly client: LambdaClient,
    private readonly context: AwsCallContext,
  ) {}

  async *list(signal: AbortSignal): AsyncGenerator<FunctionSnapshot> {
    const pages = paginate(
      (marker) =>
        callAws(this.context, signal, "lambda:ListFunctions", () =>
          this.client.send(new ListFunctionsCommand({ Marker: marker }), {
            abortSignal: signal,
          }),
        ),
      (page) => page.NextMarker,
    );

    for await (const page of pages) {
      for (const fn of page.Functions ?? []) {
        if (!fn.FunctionName) {
          continue;
        }
        yield {
          resource_id: fn.FunctionName,
          kms_key_arn: fn.KMSKeyArn,
          reserved_concurrency: await this.reservedConcurrency(
            fn.FunctionName,
            signal,
          ),
          has_resource_policy: await this.hasResourcePolicy(
            fn.FunctionName,
            signal,
          ),
        };
      }
    }
  }

  private async reservedConcurrency(
    functionName: string,
    signal: AbortSignal,
  ): Promise<number | undefined> {
    const response = await callAws(
      this.context,
      signal,
      "lambda:GetFunctionConcurrency",
      () =>
        this.client.send(
          new GetFunctionConcurrencyCommand({ FunctionName: functionName }),
          { abortSignal: signal },
        ),
    );
    return response.ReservedConcurrentExecutions;
  }

  private async hasResourcePolicy(
    functionName: string,
    signal: AbortSignal,
  ): Promise<boolean> {
    try {
      const response = await callAws(
        this.context,
        signal,
        "lambda:GetPolicy",
        () =>
          this.client.send(new GetPolicyCommand({ FunctionName: functionName }), {
            abortSignal: signal,
          }),
      );
      return Boolean(response.Policy);
    } catch (error) {
      // Functions without a resource policy answer with ResourceNotFoundException.
      if (isAwsError(error, "ResourceNotFoundException")) {
        return false;
      }
      throw error;
    }
  }
}
