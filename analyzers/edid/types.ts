"use strict";

export type EdidManufacturerCodes = readonly [number, number, number];

export type EdidManufacturerId = {
  readonly codes: EdidManufacturerCodes;
  // Code units cast directly to characters, without the +64 letter offset.
  readonly characters: string;
};

export type EdidManufactureDate = {
  readonly week: number;
  readonly year: number;
};

export type EdidProductInfo = {
  readonly manufacturerId: EdidManufacturerId;
  readonly productCode: number;
  readonly serialNumber: number;
  readonly manufactureDate: EdidManufactureDate;
};

export type EdidVersion = {
  readonly version: number;
  readonly revision: number;
};

export type EdidSignalLevel = {
  readonly high: number;
  readonly low: number;
};

export type EdidSupportedSync = {
  readonly serratedVsync: boolean;
  readonly syncOnGreen: boolean;
  readonly compositeSync: boolean;
  readonly separateSync: boolean;
};

export type EdidVideoInput =
  | {
      readonly kind: "analog";
      readonly signalLevel: EdidSignalLevel;
      readonly setupExpected: boolean;
      readonly supportedSync: EdidSupportedSync;
    }
  | {
      readonly kind: "digital";
      readonly dfpCompatible: boolean;
    };

export type EdidImageSize = {
  readonly width: number;
  readonly height: number;
};

export type EdidDisplayType = "monochrome" | "rgb-color" | "other-color" | "undefined";

export type EdidDpmsFeatures = {
  readonly standbySupported: boolean;
  readonly suspendSupported: boolean;
  readonly lowPowerSupported: boolean;
  readonly displayType: EdidDisplayType;
  readonly defaultSrgb: boolean;
  readonly preferredTimingMode: boolean;
  readonly defaultGtfSupported: boolean;
};

export type EdidDisplayParameters = {
  readonly input: EdidVideoInput;
  readonly maxSize: EdidImageSize | null;
  readonly gamma: number | null;
  readonly dpms: EdidDpmsFeatures;
};

export type EdidChromaticity = {
  readonly x: number;
  readonly y: number;
};

export type EdidWhitePoint = {
  readonly index: number;
  readonly x: number;
  readonly y: number;
  readonly gamma: number;
};

export type EdidColorCharacteristics = {
  readonly red: EdidChromaticity;
  readonly green: EdidChromaticity;
  readonly blue: EdidChromaticity;
  readonly white: EdidChromaticity;
  readonly whitePoints: readonly EdidWhitePoint[];
};

export type EdidEstablishedTiming =
  | "720x400@70"
  | "720x400@88"
  | "640x480@60"
  | "640x480@67"
  | "640x480@72"
  | "640x480@75"
  | "800x600@56"
  | "800x600@60"
  | "800x600@72"
  | "800x600@75"
  | "832x624@75"
  | "1024x768@87"
  | "1024x768@60"
  | "1024x768@70"
  | "1024x768@75"
  | "1280x1024@75"
  | "1152x870@75";

export type EdidAspectRatio = "16:10" | "4:3" | "5:4" | "16:9";

export type EdidStandardTiming = {
  readonly horizontalResolution: number;
  readonly aspectRatio: EdidAspectRatio;
  readonly aspectRatioValue: number;
  readonly refreshRate: number;
};

export type EdidAxisPair = {
  readonly horizontal: number;
  readonly vertical: number;
};

export type EdidStereoMode =
  | "none"
  | "sequential-right-sync"
  | "sequential-left-sync"
  | "interleaved-lines-right-even"
  | "interleaved-lines-left-even"
  | "interleaved-4-way"
  | "side-by-side";

export type EdidSyncPolarity = "positive" | "negative";

export type EdidSyncLine =
  | { readonly kind: "rgb" }
  | { readonly kind: "green" }
  | { readonly kind: "digital"; readonly polarity: EdidSyncPolarity };

export type EdidSyncType =
  | { readonly kind: "composite"; readonly serrated: boolean; readonly line: EdidSyncLine }
  | {
      readonly kind: "separate";
      readonly horizontal: EdidSyncPolarity;
      readonly vertical: EdidSyncPolarity;
    };

export type EdidDetailedTiming = {
  readonly pixelClock: number;
  readonly active: EdidAxisPair;
  readonly blanking: EdidAxisPair;
  readonly frontPorch: EdidAxisPair;
  readonly syncWidth: EdidAxisPair;
  readonly backPorch: EdidAxisPair;
  readonly imageSize: EdidImageSize;
  readonly border: EdidAxisPair;
  readonly interlaced: boolean;
  readonly stereo: EdidStereoMode;
  readonly sync: EdidSyncType;
};

export type EdidTimings = {
  readonly established: readonly EdidEstablishedTiming[];
  readonly standard: readonly EdidStandardTiming[];
  // The first entry, when present, is the preferred timing.
  readonly detailed: readonly EdidDetailedTiming[];
};

export type EdidRange = {
  readonly min: number;
  readonly max: number;
};

export type EdidSecondaryTiming =
  | { readonly kind: "none" }
  | {
      readonly kind: "gtf";
      readonly startHorizontalFrequency: number;
      readonly c: number;
      readonly m: number;
      readonly k: number;
      readonly j: number;
    }
  | { readonly kind: "opaque"; readonly selector: number; readonly bytes: readonly number[] };

export type EdidTextDescriptorKind = "serial-number" | "other-string" | "monitor-name";

export type EdidDescriptor =
  | { readonly kind: EdidTextDescriptorKind; readonly text: string }
  | {
      readonly kind: "range-limits";
      readonly verticalRate: EdidRange;
      readonly horizontalRate: EdidRange;
      readonly maxPixelClock: number;
      readonly secondaryTiming: EdidSecondaryTiming;
    }
  | { readonly kind: "manufacturer-defined"; readonly tag: number; readonly bytes: readonly number[] }
  | { readonly kind: "undefined"; readonly tag: number; readonly bytes: readonly number[] };

export type EdidRecord = {
  readonly product: EdidProductInfo;
  readonly version: EdidVersion;
  readonly display: EdidDisplayParameters;
  readonly color: EdidColorCharacteristics;
  readonly timings: EdidTimings;
  readonly descriptors: readonly EdidDescriptor[];
  readonly extensions: number;
};

export type EdidDecodeOptions = {
  // Padding descriptors (tag 0x10) skip only their header, so the following
  // slot is read 13 bytes early. Reproduces output of older decoders.
  legacyPaddingFraming?: boolean;
};
