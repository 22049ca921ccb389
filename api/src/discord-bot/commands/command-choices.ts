import type { ApplicationCommandOptionChoiceData } from 'discord.js';
import { describeEvent } from '../../events/event.mapper';
import type { EventRow, ProcedureTypeRow } from '../../drizzle/types';

/** Discord shows at most 25 autocomplete choices */
const MAX_CHOICES = 25;

/** Case-insensitive substring match on the choice label */
export function filterChoices<T extends string | number>(
  choices: ApplicationCommandOptionChoiceData<T>[],
  query: string,
): ApplicationCommandOptionChoiceData<T>[] {
  const needle = query.trim().toLowerCase();
  return choices
    .filter((choice) => choice.name.toLowerCase().includes(needle))
    .slice(0, MAX_CHOICES);
}

export function eventChoice(
  event: EventRow,
): ApplicationCommandOptionChoiceData<number> {
  return {
    name: `#${event.id} ${describeEvent(event)} (${event.status})`.slice(0, 100),
    value: event.id,
  };
}

export function procedureTypeChoice(
  type: ProcedureTypeRow,
): ApplicationCommandOptionChoiceData<number> {
  return {
    name: type.isActive ? type.name : `${type.name} (inactive)`,
    value: type.id,
  };
}
