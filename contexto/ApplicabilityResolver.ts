/**
 * Resolução de aplicabilidade de um elemento, antes de qualquer verificador.
 *
 * Ordem: faixa etária excluída do bundle → faixas do elemento →
 * condições sobre o contexto (applies_when) → aresta depends_on.
 *
 * Resultado "undecidable" mantém o elemento PENDING: pré-requisito ainda
 * pendente nunca é adivinhado.
 */

import {
  BundleElement,
  ComparisonOperator,
  ElementCheckResult,
  ElementStatus,
  GuidelineBundle,
  PatientContext
} from '../entidades/tipos';

type Applicability =
  | { kind: 'applicable' }
  | { kind: 'not_applicable'; notes: string }
  | { kind: 'undecidable'; notes: string };

const APPLICABLE: Applicability = { kind: 'applicable' };

function compare(value: number, operator: ComparisonOperator, threshold: number): boolean {
  switch (operator) {
    case 'gt': return value > threshold;
    case 'gte': return value >= threshold;
    case 'lt': return value < threshold;
    case 'lte': return value <= threshold;
  }
}

const OPERATOR_SYMBOL: Record<ComparisonOperator, string> = { gt: '>', gte: '>=', lt: '<', lte: '<=' };

/**
 * @param results resultados atuais do episódio, por element_id
 */
function resolveApplicability(
  bundle: GuidelineBundle,
  element: BundleElement,
  context: PatientContext,
  results: ReadonlyMap<string, ElementCheckResult>
): Applicability {
  if (bundle.excluded_age_groups.includes(context.age_group)) {
    return { kind: 'not_applicable', notes: `Age group ${context.age_group} excluded from ${bundle.name}` };
  }

  if (element.age_groups !== null && !element.age_groups.includes(context.age_group)) {
    return { kind: 'not_applicable', notes: `Not applicable for age group ${context.age_group}` };
  }

  const unmet = element.applies_when.find(flag => !context[flag]);
  if (unmet !== undefined) {
    return { kind: 'not_applicable', notes: `Conditional requirement not met: ${unmet}` };
  }

  const dep = element.depends_on;
  if (dep === null) {
    return APPLICABLE;
  }

  const prerequisite = results.get(dep.element_id);
  const condition = `${dep.element_id} ${OPERATOR_SYMBOL[dep.operator]} ${dep.threshold}`;
  if (!prerequisite || prerequisite.status === ElementStatus.PENDING) {
    return { kind: 'undecidable', notes: `Awaiting ${dep.element_id}` };
  }
  if (prerequisite.status !== ElementStatus.MET) {
    return {
      kind: 'not_applicable',
      notes: `Prerequisite ${dep.element_id} is ${prerequisite.status}; requires ${condition}`
    };
  }

  const value = prerequisite.value;
  if (typeof value !== 'number') {
    return { kind: 'not_applicable', notes: `Prerequisite ${dep.element_id} has no numeric value; requires ${condition}` };
  }
  if (!compare(value, dep.operator, dep.threshold)) {
    return { kind: 'not_applicable', notes: `Prerequisite value ${value} does not satisfy ${condition}` };
  }
  return APPLICABLE;
}

export { Applicability, resolveApplicability };
