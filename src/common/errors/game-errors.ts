export class GameError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'GameError';
  }
}

/** 전투 시작 시 정의를 찾지 못하는 등 엔티티 생성 실패 — 해당 전투 시작에 치명적 */
export class FactoryError extends GameError {
  constructor(message = 'Factory failure', details?: Record<string, unknown>) {
    super('FACTORY_ERROR', message, details);
    this.name = 'FactoryError';
  }
}

export const ACTION_REJECT_REASON = [
  'battle_over',
  'not_actor_turn',
  'not_player_turn',
  'actor_not_alive',
  'unknown_combatant',
  'insufficient_mp',
  'invalid_target_count',
  'invalid_target_side',
  'target_not_alive',
  'duplicate_target',
  'unknown_skill',
  'skill_not_available',
  'unknown_item',
  'item_not_consumable',
  'item_not_available',
  'unsupported_targeting',
  'missing_action_field',
] as const;
export type ActionRejectReason = (typeof ACTION_REJECT_REASON)[number];

/** 잘못된 행동 — 상태 변경 없이 호출자에게 반환되어 재입력을 유도한다 */
export class ActionRejectedError extends GameError {
  constructor(
    public readonly reason: ActionRejectReason,
    message: string = reason,
    details?: Record<string, unknown>,
  ) {
    super('ACTION_REJECTED', message, { reason, ...details });
    this.name = 'ActionRejectedError';
  }
}

export class ContentNotFoundError extends GameError {
  constructor(
    public readonly kind: string,
    public readonly id: string,
  ) {
    super('CONTENT_NOT_FOUND', `${kind} '${id}' not found`, { kind, id });
    this.name = 'ContentNotFoundError';
  }
}

export class InvalidInputError extends GameError {
  constructor(message = 'Invalid input', details?: Record<string, unknown>) {
    super('INVALID_INPUT', message, details);
    this.name = 'InvalidInputError';
  }
}
