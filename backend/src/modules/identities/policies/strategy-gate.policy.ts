/**
 * backend/src/modules/identities/policies/strategy-gate.policy.ts
 *
 * WHY:
 * - Each identity kind decides which strategies may authenticate over which
 *   channel (HTTP Authorization header vs. request params).
 * - The outer middleware asks before running a strategy at all.
 *
 * RULES:
 * - Boolean setting → applies to every strategy.
 * - List setting → only the listed strategies.
 * - Missing setting → false (restrictive default).
 */

export type StrategyGateSetting = boolean | readonly string[];

export type StrategyChannel = 'http' | 'params';

export function resolveStrategyGate(
  setting: StrategyGateSetting | undefined,
  strategy: string,
): boolean {
  if (setting === undefined) return false;
  if (typeof setting === 'boolean') return setting;
  return setting.includes(strategy);
}

export class StrategyGateKeeper {
  constructor(
    private readonly settings: Readonly<{
      httpAuthenticatable?: StrategyGateSetting;
      paramsAuthenticatable?: StrategyGateSetting;
    }>,
  ) {}

  allowsHttp(strategy: string): boolean {
    return resolveStrategyGate(this.settings.httpAuthenticatable, strategy);
  }

  allowsParams(strategy: string): boolean {
    return resolveStrategyGate(this.settings.paramsAuthenticatable, strategy);
  }

  allows(channel: StrategyChannel, strategy: string): boolean {
    return channel === 'http' ? this.allowsHttp(strategy) : this.allowsParams(strategy);
  }
}
