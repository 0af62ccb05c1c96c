export {
  CHOICE_INTERVAL_BASE,
  MIN_CHOICE_INTERVAL,
  SPEED_MULTIPLIER_RANGE,
  choiceInterval,
  createParameterModulator,
} from './parameterModulator'
export type {
  ChoiceEntry,
  EnableOptions,
  ModulatedConfig,
  ModulatorEntry,
  ModulatorOptions,
  ParameterModulator,
  RangeEntry,
} from './parameterModulator'
