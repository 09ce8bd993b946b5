export { synthesizeTone, mixPartials, normalizePeak } from "./tone";
export {
  ToneSynthesizer,
  nearestNote,
  type ToneSynthesizerConfig,
  type Session,
} from "./ToneSynthesizer";
export { TREATMENTS } from "./treatments";
