// 공유 인벤토리 — GameState.inventory (ItemStack[]) 조작

import { Inject, Injectable } from '@nestjs/common';
import {
  COMBAT_CONTENT,
  type CombatContent,
} from '../../content/combat-content.js';
import type { ItemDefinition } from '../../content/content.types.js';
import type { GameState, ItemStack } from '../../types/index.js';

export interface BattleInventoryItem {
  itemId: string;
  name: string;
  qty: number;
  targeting: ItemDefinition['targeting'];
}

@Injectable()
export class InventoryService {
  constructor(@Inject(COMBAT_CONTENT) private readonly content: CombatContent) {}

  getQuantity(game: GameState, itemId: string): number {
    return game.inventory.find((i) => i.itemId === itemId)?.qty ?? 0;
  }

  /** 아이템 추가 (같은 id 는 합산) */
  addItem(game: GameState, itemId: string, qty: number): void {
    if (qty <= 0) return;
    const existing = game.inventory.find((i) => i.itemId === itemId);
    if (existing) {
      existing.qty += qty;
    } else {
      game.inventory.push({ itemId, qty });
    }
  }

  addItems(game: GameState, items: readonly ItemStack[]): void {
    for (const item of items) this.addItem(game, item.itemId, item.qty);
  }

  /** 수량이 부족하면 false (변경 없음) */
  removeItem(game: GameState, itemId: string, qty = 1): boolean {
    const existing = game.inventory.find((i) => i.itemId === itemId);
    if (!existing || existing.qty < qty) return false;
    existing.qty -= qty;
    if (existing.qty <= 0) {
      game.inventory = game.inventory.filter((i) => i.itemId !== itemId);
    }
    return true;
  }

  /** 전투 중 사용 가능한 소모품 (보유 수량 > 0) */
  getBattleItems(game: GameState): BattleInventoryItem[] {
    const result: BattleInventoryItem[] = [];
    for (const stack of game.inventory) {
      if (stack.qty <= 0 || !this.content.items.has(stack.itemId)) continue;
      const def = this.content.items.get(stack.itemId);
      if (def.kind !== 'consumable') continue;
      result.push({ itemId: def.id, name: def.name, qty: stack.qty, targeting: def.targeting });
    }
    return result;
  }

  /** 골드 변경 (0 미만 불가) */
  adjustGold(game: GameState, delta: number): number {
    game.gold = Math.max(0, game.gold + delta);
    return game.gold;
  }
}
