/**
 * Payloads handled as opaque units: their bytes are kept as read.
 */

export type VideoFormat = 'CaVp8' | 'Ivf';

export class OpaqueMedia {
  constructor(public data: Buffer) {}

  encode(): Buffer {
    return Buffer.from(this.data);
  }
}

export class Image extends OpaqueMedia {
  readonly type = 'Image';

  clone(): Image {
    return new Image(Buffer.from(this.data));
  }
}

export class Audio extends OpaqueMedia {
  readonly type = 'Audio';

  clone(): Audio {
    return new Audio(Buffer.from(this.data));
  }
}

export class RigidModel extends OpaqueMedia {
  readonly type = 'RigidModel';

  clone(): RigidModel {
    return new RigidModel(Buffer.from(this.data));
  }
}

export class Video extends OpaqueMedia {
  readonly type = 'Video';

  constructor(data: Buffer, public readonly format: VideoFormat) {
    super(data);
  }

  static decode(data: Buffer): Video {
    return new Video(Buffer.from(data), data.subarray(0, 4).toString('latin1') === 'DKIF' ? 'Ivf' : 'CaVp8');
  }

  clone(): Video {
    return new Video(Buffer.from(this.data), this.format);
  }
}
