import { balancedCoreStrategy } from './balancedCoreStrategy.js';
import { defensiveIncomeStrategy } from './defensiveIncomeStrategy.js';
import { momentumTiltStrategy } from './momentumTiltStrategy.js';
import { StrategyFamilyPlugin } from './types.js';

export class StrategyRegistry {
  private readonly families = new Map<string, StrategyFamilyPlugin>();

  constructor(plugins: StrategyFamilyPlugin[] = [balancedCoreStrategy, momentumTiltStrategy, defensiveIncomeStrategy]) {
    for (const plugin of plugins) {
      this.register(plugin);
    }
  }

  register(plugin: StrategyFamilyPlugin): void {
    if (this.families.has(plugin.id)) {
      throw new Error(`Strategy family '${plugin.id}' is already registered.`);
    }
    this.families.set(plugin.id, plugin);
  }

  get(id: string): StrategyFamilyPlugin | undefined {
    return this.families.get(id);
  }

  list(): StrategyFamilyPlugin[] {
    return [...this.families.values()];
  }
}
