import type { BlindSlot, BlindState } from './types';

export const BLIND_ORDER: BlindSlot[] = ['Small', 'Big', 'Boss'];

const SLOT_REWARD: Record<BlindSlot, number> = { Small: 3, Big: 4, Boss: 6 };

function assertAnte(ante: number): void {
  if (!Number.isInteger(ante) || ante < 1) {
    throw new RangeError(`ante must be an integer >= 1, got ${ante}.`);
  }
}

export function anteBase(ante: number): number {
  assertAnte(ante);
  return 80 + (ante - 1) * 60;
}

// Small is 3/4 and Boss 5/4 of the ante base, rounded down
export function blindTarget(ante: number, slot: BlindSlot): number {
  const base = anteBase(ante);
  switch (slot) {
    case 'Small':
      return Math.floor((base * 3) / 4);
    case 'Big':
      return base;
    case 'Boss':
      return Math.floor((base * 5) / 4);
  }
}

export function blindReward(ante: number, slot: BlindSlot): number {
  assertAnte(ante);
  return SLOT_REWARD[slot] + Math.floor(ante / 2);
}

export function nextBlind(blind: BlindState): BlindState {
  const idx = BLIND_ORDER.indexOf(blind.slot);
  if (idx === BLIND_ORDER.length - 1) {
    return { ante: blind.ante + 1, slot: BLIND_ORDER[0] };
  }
  return { ante: blind.ante, slot: BLIND_ORDER[idx + 1] };
}
