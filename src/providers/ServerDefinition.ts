import type { ProviderId } from '../dispatch/domain/Provider';
import type { ToolSpec } from '../dispatch/domain/ToolSpec';

/**
 * What one executable serves: its MCP identity, the providers it needs
 * credentials for and its tool table.
 */
export interface ServerDefinition {
  name: string;
  version: string;
  providers: readonly ProviderId[];
  tools: readonly ToolSpec[];
}
