// One audio flush: sampleCount stereo frames, interleaved L/R.
export interface AudioPacket {
  sampleCount: number;
  samples: Int16Array;
}

/**
 * Functions the embedding host registers. Both are optional and invoked inline,
 * from inside the core's frame; a host without audio simply leaves onAudioWrite unset.
 */
export interface HostCallbacks {
  onVideoModeChange?: (width: number, height: number) => void;
  onAudioWrite?: (packet: AudioPacket) => void;
}
