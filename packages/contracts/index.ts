export * from "./core/units";

export * from "./errors/errors";

export * from "./letters/letters";

export * from "./ratio/ratio";

// Waveform type and peak helper
export * from "./signal/waveform";

export * from "./treatments/treatments";

export * from "./levels/levels";

export * from "./prompt/prompt";
