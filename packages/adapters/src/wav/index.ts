export { encodePcm16Wav } from "./PcmWavEncoder";
