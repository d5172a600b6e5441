/**
 * ACTOR SYSTEM
 * Pure functions for modifying Actor data.
 */
import type { Actor, Player } from '../types';

export const isDead = (actor: Actor): boolean => actor.hp <= 0;

/** HP has no floor in storage; displays clamp with displayHp. */
export const applyDamage = <T extends Actor>(actor: T, amount: number): T => {
    if (amount <= 0) return actor;
    return { ...actor, hp: actor.hp - amount };
};

/** Heals up to maxHp; never lowers HP. Returns the amount actually restored. */
export const applyHeal = (player: Player, amount: number): { player: Player; healed: number } => {
    const target = Math.max(player.hp, Math.min(player.maxHp, player.hp + amount));
    const healed = target - player.hp;
    return { player: healed === 0 ? player : { ...player, hp: target }, healed };
};

export const displayHp = (actor: Actor): number => Math.max(0, actor.hp);
