export * from './errors';
export * from './logging';
export * from './config';
export * from './time/parseTime';
export * from './time/interval';
export * from './timelapse/types';
export * from './timelapse/artifactNaming';
export * from './timelapse/artifactScan';
export * from './timelapse/FrameScheduler';
export * from './timelapse/concatScript';
export * from './capture/types';
export { CaptureSessionController, DEFAULT_CONFIG as DEFAULT_CAPTURE_CONFIG } from './capture/CaptureSessionController';
export { MediaTrackConsumer, isRecordableTrack } from './capture/MediaTrackConsumer';
export { H264Depacketizer } from './capture/h264Depacketizer';
export { WeriftPeerSession, type WeriftPeerSessionOptions } from './capture/WeriftPeerSession';
export * from './device/types';
export * from './device/DeviceClient';
export { createGoogleDeviceApi } from './device/googleDeviceApi';
export * from './auth/TokenSource';
export * from './encoder/cropFilter';
export * from './encoder/FfmpegEncoder';
export * from './pipeline/capturePipeline';
export * from './pipeline/timelapsePipeline';
