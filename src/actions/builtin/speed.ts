import { SPEED_STEP_SECONDS, clampSpeed } from '../../config/PlaybackConfig';
import { success, type Action, type ReversibleAction } from '../Action';

function setSpeedAction(speed: number): Action {
  return {
    name: 'set_speed',
    description: `Set speed to ${speed}s`,
    applicability: 'both',
    execute() {
      return success({ speed }, { speed });
    },
  };
}

function createSpeedStep(name: string, description: string, delta: number): ReversibleAction {
  return {
    name,
    description,
    applicability: 'both',
    execute(session) {
      const speed = clampSpeed(session.speed + delta);
      return success({ speed }, { speed });
    },
    // restores the exact previous value, including when the step was clamped
    inverse(before) {
      return setSpeedAction(before.speed);
    },
  };
}

export const increaseSpeedAction = createSpeedStep(
  'increase_speed',
  'Slower transitions (add 1s)',
  SPEED_STEP_SECONDS
);

export const decreaseSpeedAction = createSpeedStep(
  'decrease_speed',
  'Faster transitions (subtract 1s)',
  -SPEED_STEP_SECONDS
);
