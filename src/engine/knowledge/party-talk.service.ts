// 파티 대화 — 동료의 지식으로 적 정보를 읽어준다. 카운터 기록 없음, RNG 없음

import { Inject, Injectable } from '@nestjs/common';
import {
  COMBAT_CONTENT,
  type CombatContent,
} from '../../content/combat-content.js';
import type { KnowledgeEntry } from '../../content/content.types.js';
import { KnowledgeService } from './knowledge.service.js';
import {
  isAlive,
  type BattleState,
  type Combatant,
  type GameState,
} from '../../types/index.js';

export interface PartyTalkResult {
  text: string;
  lines: string[];
  /** HIDDEN → STATIC_RANGE 로 임시 공개될 적 instance id */
  revealEnemyIds: string[];
}

interface EnemyGroup {
  knowledgeKey: string;
  name: string;
  tags: string[];
  members: Combatant[];
}

@Injectable()
export class PartyTalkService {
  constructor(
    @Inject(COMBAT_CONTENT) private readonly content: CombatContent,
    private readonly knowledge: KnowledgeService,
  ) {}

  /** 실제 발화 — 임시 공개만 적용 */
  talk(battle: BattleState, speaker: Combatant): PartyTalkResult {
    const result = this.preview(battle, speaker);
    for (const id of result.revealEnemyIds) {
      const enemy = battle.enemies.find((e) => e.instanceId === id);
      if (enemy) this.knowledge.revealTemporarily(battle, enemy, 'STATIC_RANGE');
    }
    return result;
  }

  /** 순수 — 상태 변경 없음 */
  preview(battle: BattleState, speaker: Combatant): PartyTalkResult {
    const entries = this.content.knowledgeFor(speaker.sourceId ?? speaker.instanceId);
    const lines: string[] = [];
    const revealEnemyIds: string[] = [];

    if (entries.length > 0) {
      for (const group of this.groupLivingEnemies(battle)) {
        const entry = this.matchEntry(entries, group);
        if (!entry) continue;

        const lead = group.members[0];
        const mode = this.knowledge.effectiveHpMode(battle, lead);
        const parts: string[] = [];
        if (mode === 'REALTIME') {
          parts.push(`${group.name} has ${lead.stats.hp}/${lead.stats.maxHp} HP.`);
        } else {
          const range = this.knowledge.staticRangeOf(battle, lead);
          parts.push(`${group.name} look to have around ${range.low}-${range.high} HP.`);
        }
        if (entry.speedHint) parts.push(entry.speedHint);
        if (entry.behavior) parts.push(entry.behavior);
        lines.push(parts.join(' '));

        for (const member of group.members) {
          if (this.knowledge.effectiveHpMode(battle, member) === 'HIDDEN') {
            revealEnemyIds.push(member.instanceId);
          }
        }
      }
    }

    const text =
      lines.length === 0
        ? `${speaker.name}: I'm not sure about these foes.`
        : `${speaker.name}: ${lines.join(' ')}`;
    return { text, lines, revealEnemyIds };
  }

  /** 현재 파티(플레이어 + 동료) 중 누군가 해당 태그의 지식을 가졌는지 */
  partyHasKnowledge(game: GameState, enemyTags: readonly string[]): boolean {
    const memberIds = [...(game.player ? [game.player.id] : []), ...game.partyMembers];
    return memberIds.some((id) =>
      this.content
        .knowledgeFor(id)
        .some((entry) => entry.enemyTags.some((t) => enemyTags.includes(t))),
    );
  }

  /** 살아있는 적을 지식 키로 묶고 키 순으로 정렬 */
  private groupLivingEnemies(battle: BattleState): EnemyGroup[] {
    const groups = new Map<string, EnemyGroup>();
    for (const enemy of battle.enemies) {
      if (!isAlive(enemy)) continue;
      const key = this.knowledge.knowledgeKeyOf(enemy);
      const existing = groups.get(key);
      if (existing) {
        existing.members.push(enemy);
        continue;
      }
      const sourceId = enemy.sourceId;
      const name =
        sourceId !== undefined && this.content.enemies.has(sourceId)
          ? this.content.enemies.get(sourceId).name
          : enemy.name;
      groups.set(key, { knowledgeKey: key, name, tags: enemy.tags, members: [enemy] });
    }
    return [...groups.keys()]
      .sort()
      .map((key) => groups.get(key))
      .filter((g): g is EnemyGroup => g !== undefined);
  }

  /** 지식 키 일치 우선, 그다음 태그 겹침 */
  private matchEntry(
    entries: readonly KnowledgeEntry[],
    group: EnemyGroup,
  ): KnowledgeEntry | undefined {
    return (
      entries.find((e) => e.knowledgeKeys.includes(group.knowledgeKey)) ??
      entries.find((e) => e.enemyTags.some((t) => group.tags.includes(t)))
    );
  }
}
