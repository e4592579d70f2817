export {
	TickOrigin,
	type Tick,
	type TickIdentity,
	type TickEmitter,
	type TickSource,
	type TickSourceStats,
} from "./types.js";
export { TickNormalizer, type TickNormalizerConfig } from "./tick-normalizer.js";
export { type LiveChannel, EmitterLiveChannel } from "./live-channel.js";
export { WsLiveChannel, type WsLiveChannelConfig } from "./ws-live-channel.js";
export { PushTickSource, type PushTickSourceConfig } from "./push-source.js";
export { ReplayTickSource, type ReplayPacing, type ReplayTickSourceConfig } from "./replay-source.js";
export { readTickFile, toTickLines, type CorruptLine, type TickFileContents } from "./tick-file.js";
