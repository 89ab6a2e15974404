import { Table } from '../utils/data-structures/table.js';
import { DFA } from './dfa.js';

/**
 * Give each distinct key an id, in the order the keys first appear.
 */
function numberKeys(keys: string[]): { ids: number[]; count: number } {
  const idForKey: Map<string, number> = new Map();
  const ids = keys.map((key) => {
    let id = idForKey.get(key);
    if (id === undefined) {
      id = idForKey.size;
      idForKey.set(key, id);
    }
    return id;
  });
  return { ids, count: idForKey.size };
}

/**
 * Merge states that no input can tell apart.
 *
 * States start out grouped by the rule they accept (or none) and
 * groups are split until every state in a group goes to the same
 * group on every symbol class. Groups are then numbered by their
 * lowest state, so the reject state keeps id 0.
 */
export function minimize(dfa: DFA): DFA {
  const states = [...Array(dfa.numStates).keys()];
  let { ids: block, count } = numberKeys(
    states.map((s) => `${dfa.getAccept(s)}`)
  );

  while (true) {
    const refined = numberKeys(
      states.map((s) => {
        let key = `${block[s]}`;
        for (let cls = 0; cls < dfa.numClasses; cls++) {
          key += `,${block[dfa.getClassTransition(s, cls)]}`;
        }
        return key;
      })
    );
    block = refined.ids;
    if (refined.count == count) {
      break;
    }
    count = refined.count;
  }

  // states are visited in ascending order, so the first state seen
  // in a block is its lowest one
  const representatives: number[] = [];
  for (const s of states) {
    if (representatives[block[s]] === undefined) {
      representatives[block[s]] = s;
    }
  }

  const transitions: Table<number> = new Table(dfa.numClasses);
  for (const rep of representatives) {
    transitions.addRow((cls) => block[dfa.getClassTransition(rep, cls)]);
  }
  return new DFA(
    dfa.symbolClasses,
    transitions,
    representatives.map((rep) => dfa.getAccept(rep)),
    block[dfa.getStartState()]
  );
}
