import {
  GetFunctionCommand,
  LambdaClient,
  type GetFunctionCommandInput,
  type GetFunctionCommandOutput,
} from "@aws-sdk/client-lambda";

// =============================================================================
// TYPES
// =============================================================================

/** Optional human-friendly name for a function, shown in report subjects and bodies. */
export interface DisplayNameSource {
  resolveDisplayName(functionName: string): Promise<string | undefined>;
}

export type LambdaTagsTransport = {
  getFunction: (input: GetFunctionCommandInput) => Promise<Pick<GetFunctionCommandOutput, "Tags">>;
};

export const DEFAULT_DISPLAY_NAME_TAG = "DISPLAY_NAME";

// =============================================================================
// SOURCES
// =============================================================================

export class StaticDisplayNameSource implements DisplayNameSource {
  constructor(private readonly names: Readonly<Record<string, string>> = {}) {}

  async resolveDisplayName(functionName: string): Promise<string | undefined> {
    return this.names[functionName];
  }
}

export class LambdaTagDisplayNameSource implements DisplayNameSource {
  private readonly transport: LambdaTagsTransport;
  private readonly tagName: string;

  constructor(
    options: {
      tagName?: string;
      region?: string;
      client?: LambdaClient;
      transport?: LambdaTagsTransport;
    } = {},
  ) {
    this.tagName = options.tagName ?? DEFAULT_DISPLAY_NAME_TAG;
    this.transport =
      options.transport ??
      createTransport(options.client ?? new LambdaClient({ region: options.region }));
  }

  async resolveDisplayName(functionName: string): Promise<string | undefined> {
    const response = await this.transport.getFunction({ FunctionName: functionName });
    const value = response.Tags?.[this.tagName]?.trim();
    return value ? value : undefined;
  }
}

export async function resolveDisplayName(
  source: DisplayNameSource,
  functionName: string,
): Promise<string> {
  return (await source.resolveDisplayName(functionName)) ?? functionName;
}

function createTransport(client: LambdaClient): LambdaTagsTransport {
  return {
    getFunction: (input) => client.send(new GetFunctionCommand(input)),
  };
}
