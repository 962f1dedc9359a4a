// 스킬 — 사용 가능 목록, 타겟 검증, MP 차감, 효과 적용

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ActionRejectedError } from '../../common/errors/game-errors.js';
import {
  COMBAT_CONTENT,
  type CombatContent,
} from '../../content/combat-content.js';
import type { SkillDefinition } from '../../content/content.types.js';
import { DamageService } from './damage.service.js';
import {
  findCombatant,
  isAlive,
  isSkillEffectKind,
  type BattleEvent,
  type BattleState,
  type Combatant,
} from '../../types/index.js';

@Injectable()
export class SkillService {
  private readonly logger = new Logger(SkillService.name);

  constructor(
    @Inject(COMBAT_CONTENT) private readonly content: CombatContent,
    private readonly damage: DamageService,
  ) {}

  /** 무기 태그가 requiredWeaponTags 를 모두 포함하는 스킬. 맨손이면 없음 */
  eligibleSkillIds(weaponTags: readonly string[]): string[] {
    if (weaponTags.length === 0) return [];
    return this.content.skills
      .all()
      .filter((s) => s.requiredWeaponTags.every((t) => weaponTags.includes(t)))
      .map((s) => s.id);
  }

  getAvailableSkills(combatant: Combatant): SkillDefinition[] {
    return combatant.skillIds
      .filter((id) => this.content.skills.has(id))
      .map((id) => this.content.skills.get(id));
  }

  /** 장착 스킬 조회. 없거나 장착되지 않았으면 거부 */
  requireSkill(actor: Combatant, skillId: string): SkillDefinition {
    if (!this.content.skills.has(skillId)) {
      throw new ActionRejectedError('unknown_skill', `Unknown skill '${skillId}'`, { skillId });
    }
    if (!actor.skillIds.includes(skillId)) {
      throw new ActionRejectedError('skill_not_available', undefined, {
        skillId,
        combatantId: actor.instanceId,
      });
    }
    return this.content.skills.get(skillId);
  }

  /** 타겟 모드별 검증 — 변경 전에 모두 끝난다 */
  resolveTargets(
    battle: BattleState,
    actor: Combatant,
    skill: SkillDefinition,
    targetIds: readonly string[],
  ): Combatant[] {
    if (skill.targetMode === 'self') {
      if (targetIds.length > 1 || (targetIds.length === 1 && targetIds[0] !== actor.instanceId)) {
        throw new ActionRejectedError('invalid_target_count', undefined, { skillId: skill.id });
      }
      return [actor];
    }

    const max = skill.targetMode === 'single_enemy' ? 1 : skill.maxTargets;
    const min = 1;
    if (targetIds.length < min || targetIds.length > max) {
      throw new ActionRejectedError('invalid_target_count', undefined, {
        skillId: skill.id,
        count: targetIds.length,
        max,
      });
    }
    if (new Set(targetIds).size !== targetIds.length) {
      throw new ActionRejectedError('duplicate_target', undefined, { skillId: skill.id });
    }

    return targetIds.map((id) => {
      const target = findCombatant(battle, id);
      if (!target) {
        throw new ActionRejectedError('unknown_combatant', undefined, { targetId: id });
      }
      if (target.side === actor.side) {
        throw new ActionRejectedError('invalid_target_side', undefined, { targetId: id });
      }
      if (!isAlive(target)) {
        throw new ActionRejectedError('target_not_alive', undefined, { targetId: id });
      }
      return target;
    });
  }

  canAfford(actor: Combatant, skill: SkillDefinition): boolean {
    return actor.stats.mp >= skill.mpCost;
  }

  /**
   * 스킬 실행. 알 수 없는 효과는 변경 없이 skill_failed.
   * 턴 진행/종료 판정은 호출자 책임.
   */
  execute(
    battle: BattleState,
    actor: Combatant,
    skillId: string,
    targetIds: readonly string[],
  ): BattleEvent[] {
    const skill = this.requireSkill(actor, skillId);
    if (!this.canAfford(actor, skill)) {
      throw new ActionRejectedError('insufficient_mp', undefined, {
        skillId,
        mp: actor.stats.mp,
        mpCost: skill.mpCost,
      });
    }
    const targets = this.resolveTargets(battle, actor, skill, targetIds);

    const effect = skill.effectType;
    if (!isSkillEffectKind(effect)) {
      this.logger.warn(`Skill '${skill.id}' has unknown effect type '${effect}', ignored`);
      return [
        {
          type: 'skill_failed',
          combatantId: actor.instanceId,
          combatantName: actor.name,
          skillId: skill.id,
          reason: `unknown_effect:${effect}`,
        },
      ];
    }

    actor.stats.mp -= skill.mpCost;

    if (effect === 'guard') {
      actor.guardReduction = skill.basePower;
      return [
        {
          type: 'guard_applied',
          combatantId: actor.instanceId,
          combatantName: actor.name,
          amount: skill.basePower,
        },
      ];
    }

    const events: BattleEvent[] = [];
    for (const target of targets) {
      const result = this.damage.resolve(battle, actor, target, skill.basePower, skill.tags);
      events.push({
        type: 'skill_used',
        attackerId: actor.instanceId,
        attackerName: actor.name,
        skillId: skill.id,
        skillName: skill.name,
        targetId: target.instanceId,
        targetName: target.name,
        damage: result.damage,
        absorbed: result.absorbed,
        targetHp: result.targetHp,
      });
      if (result.defeated) {
        events.push({
          type: 'combatant_defeated',
          combatantId: target.instanceId,
          combatantName: target.name,
          side: target.side,
        });
      }
    }
    return events;
  }

  /** 순수 미리보기 — 스킬 태그까지 반영 */
  estimate(attacker: Combatant, target: Combatant, skill?: SkillDefinition): number {
    if (!skill) return this.damage.estimate(attacker, target);
    return this.damage.estimate(attacker, target, skill.basePower, skill.tags);
  }
}
