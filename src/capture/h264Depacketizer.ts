import type { MediaUnit } from './types';

const START_CODE = Buffer.from([0x00, 0x00, 0x00, 0x01]);

const NAL_SPS = 7;
const NAL_STAP_A = 24;
const NAL_FU_A = 28;

const nalType = (byte: number) => byte & 0x1f;

/**
 * Reassembles H.264 NAL units from RTP payloads (RFC 6184 single NAL,
 * STAP-A and FU-A packets) into an Annex-B byte stream.
 *
 * Nothing is emitted until the first SPS arrives so the stream opens on a
 * decodable key frame. A fragmented NAL with a gap in its sequence numbers
 * is dropped whole.
 */
export class H264Depacketizer {
  private fragments: Buffer[] | null = null;
  private lastFragmentSequence = 0;
  private seenKeyFrame = false;

  push(unit: MediaUnit): Buffer[] {
    const { payload } = unit;
    if (payload.length === 0) return [];

    const type = nalType(payload[0]);
    let nals: Buffer[] = [];
    if (type >= 1 && type <= 23) {
      nals = [payload];
    } else if (type === NAL_STAP_A) {
      nals = this.splitAggregate(payload);
    } else if (type === NAL_FU_A) {
      const nal = this.pushFragment(payload, unit.sequenceNumber);
      nals = nal ? [nal] : [];
    }

    const out: Buffer[] = [];
    for (const nal of nals) {
      if (!this.seenKeyFrame) {
        if (nalType(nal[0]) !== NAL_SPS) continue;
        this.seenKeyFrame = true;
      }
      out.push(START_CODE, nal);
    }
    return out;
  }

  private splitAggregate(payload: Buffer) {
    const nals: Buffer[] = [];
    let offset = 1;
    while (offset + 2 <= payload.length) {
      const size = payload.readUInt16BE(offset);
      offset += 2;
      if (size === 0 || offset + size > payload.length) break;
      nals.push(payload.subarray(offset, offset + size));
      offset += size;
    }
    return nals;
  }

  private pushFragment(payload: Buffer, sequenceNumber: number) {
    if (payload.length < 2) return null;
    const indicator = payload[0];
    const header = payload[1];
    const isStart = (header & 0x80) !== 0;
    const isEnd = (header & 0x40) !== 0;

    if (isStart) {
      const reconstructed = (indicator & 0xe0) | (header & 0x1f);
      this.fragments = [Buffer.from([reconstructed]), payload.subarray(2)];
    } else if (this.fragments && sequenceNumber === ((this.lastFragmentSequence + 1) & 0xffff)) {
      this.fragments.push(payload.subarray(2));
    } else {
      // missing start or a gap in sequence numbers: drop the NAL, wait for the next start
      this.fragments = null;
      return null;
    }
    this.lastFragmentSequence = sequenceNumber;

    if (!isEnd) return null;
    const nal = Buffer.concat(this.fragments);
    this.fragments = null;
    return nal;
  }
}
