import { GuidelineBundle, TriggerMatch } from '../entidades/tipos';

/**
 * Descobre pacientes que entraram nos critérios de um bundle.
 * Os critérios clínicos de entrada ficam fora do motor.
 */
interface TriggerFinder {
  findTriggers(bundle: GuidelineBundle, since: Date): Promise<TriggerMatch[]>;
}

/**
 * Matches fixos por bundle (fixtures e testes). Devolve todos os matches:
 * `since` só restringe fontes vivas.
 */
class StaticTriggerFinder implements TriggerFinder {
  private readonly matches: Map<string, TriggerMatch[]>;

  constructor(matches: Map<string, TriggerMatch[]> = new Map()) {
    this.matches = new Map(matches);
  }

  add(bundleId: string, match: TriggerMatch): this {
    const list = this.matches.get(bundleId) ?? [];
    list.push(match);
    this.matches.set(bundleId, list);
    return this;
  }

  async findTriggers(bundle: GuidelineBundle): Promise<TriggerMatch[]> {
    return [...(this.matches.get(bundle.bundle_id) ?? [])];
  }
}

export { TriggerFinder, StaticTriggerFinder };
