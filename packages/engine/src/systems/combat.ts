/**
 * COMBAT SYSTEM
 * Dice-vs-dice melee. Attack roll first, then defence roll, both from the
 * state's entropy pool; damage is the positive difference.
 */
import type { Actor, GameState } from '../types';
import { getActorById, updateActor } from '../helpers';
import { applyDamage, displayHp, isDead } from './actor';
import { formatDice, rollDice } from './dice';
import { appendTaggedMessage } from './engine-messages';

export interface AttackOutcome {
    attackRoll: number;
    defenceRoll: number;
    damage: number;
}

export const describeAttack = (attacker: Actor, defender: Actor, outcome: AttackOutcome, defenderAfter: Actor): string => {
    const rolls = `${attacker.name} attacks ${defender.name}: ${formatDice(attacker.attackDice)} rolled ${outcome.attackRoll} vs ${formatDice(defender.defenceDice)} rolled ${outcome.defenceRoll}.`;
    const result = outcome.damage > 0 ? `Hit for ${outcome.damage} damage!` : 'Blocked!';
    return `${rolls} ${result} ${defender.name} HP: ${displayHp(defenderAfter)}`;
};

/**
 * One attack. Missing actors leave the state untouched.
 */
export const resolveAttack = (
    state: GameState,
    attackerId: string,
    defenderId: string
): { state: GameState; outcome?: AttackOutcome } => {
    const attacker = getActorById(state, attackerId);
    const defender = getActorById(state, defenderId);
    if (!attacker || !defender) return { state };

    const attack = rollDice(state, attacker.attackDice);
    const defence = rollDice(attack.nextState, defender.defenceDice);

    const attackRoll = Math.max(0, attack.value);
    const defenceRoll = Math.max(0, defence.value);
    const damage = attackRoll - defenceRoll;
    const outcome: AttackOutcome = { attackRoll, defenceRoll, damage };

    const defenderAfter = applyDamage(defender, damage);
    const withDefender = updateActor(defence.nextState, defenderAfter);

    return {
        state: {
            ...withDefender,
            message: appendTaggedMessage(withDefender.message, describeAttack(attacker, defender, outcome, defenderAfter), 'INFO', 'COMBAT')
        },
        outcome
    };
};

const removeEnemyIfDead = (state: GameState, id: string): GameState => {
    const enemy = state.enemies.find(e => e.id === id);
    if (!enemy || !isDead(enemy)) return state;
    return {
        ...state,
        enemies: state.enemies.filter(e => e.id !== id),
        kills: state.kills + 1,
        message: appendTaggedMessage(state.message, `${enemy.name} is slain!`, 'INFO', 'COMBAT')
    };
};

/**
 * Aggressor strikes; a surviving target strikes back. Dead enemies leave the
 * level and count as kills. Nobody changes tile.
 */
export const resolveMeleeExchange = (state: GameState, aggressorId: string, targetId: string): GameState => {
    let curState = resolveAttack(state, aggressorId, targetId).state;

    const target = getActorById(curState, targetId);
    if (target && !isDead(target)) {
        curState = resolveAttack(curState, targetId, aggressorId).state;
    }

    curState = removeEnemyIfDead(curState, targetId);
    curState = removeEnemyIfDead(curState, aggressorId);

    if (!isDead(state.player) && isDead(curState.player)) {
        curState = {
            ...curState,
            message: appendTaggedMessage(curState.message, 'You have fallen.', 'CRITICAL', 'COMBAT')
        };
    }

    return curState;
};
