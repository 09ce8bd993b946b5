// Constants
export * from "./constants/DerivedConstants";

// Letter values
export * from "./letters";

// Ratio comparison
export * from "./ratio";

// Tone synthesis
export * from "./synthesis";

// Level tracking
export * from "./levels";

// Prompt wrapping
export * from "./prompt";
