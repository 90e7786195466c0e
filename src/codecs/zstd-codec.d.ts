// zstd-codec ships no type declarations; this covers the part used here.
declare module "zstd-codec" {
  namespace zstdCodec {
    interface ZstdSimple {
      compress(data: Uint8Array, level?: number): Uint8Array | null;
      decompress(data: Uint8Array): Uint8Array | null;
    }
    interface ZstdBinding {
      Simple: new () => ZstdSimple;
    }
  }
  const zstdCodec: {
    ZstdCodec: { run(onReady: (zstd: zstdCodec.ZstdBinding) => void): void };
  };
  export = zstdCodec;
}
