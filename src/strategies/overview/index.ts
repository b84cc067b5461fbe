/**
 * Overview Strategy Registry
 */

import type { OverviewStrategyId } from "@/core/domain/SiteConfig";
import type { IOverviewStrategy } from "@/core/interfaces/IOverviewStrategy";
import { NetworkOverviewStrategy } from "./NetworkOverviewStrategy";
import { DomOverviewStrategy } from "./DomOverviewStrategy";
import { FullPageOverviewStrategy } from "./FullPageOverviewStrategy";

export { NetworkOverviewStrategy } from "./NetworkOverviewStrategy";
export { DomOverviewStrategy } from "./DomOverviewStrategy";
export { FullPageOverviewStrategy } from "./FullPageOverviewStrategy";

const STRATEGY_FACTORIES: Record<OverviewStrategyId, () => IOverviewStrategy> =
  {
    network: () => new NetworkOverviewStrategy(),
    dom: () => new DomOverviewStrategy(),
    full_page: () => new FullPageOverviewStrategy(),
  };

/**
 * 전략 ID 목록 → 전략 인스턴스 목록 (순서 유지)
 */
export function createOverviewStrategies(
  ids: readonly OverviewStrategyId[],
): IOverviewStrategy[] {
  return ids.map((id) => STRATEGY_FACTORIES[id]());
}
