export { LevelTracker, type LevelTrackerConfig } from "./LevelTracker";
