/**
 * Planet and sign catalog.
 *
 * Order matters: PLANET_ORDER is the canonical iteration order for snapshots,
 * aspect pairs and snapshot row columns.
 */

export const PLANET_ORDER = [
  "Sun",
  "Moon",
  "Mercury",
  "Venus",
  "Mars",
  "Jupiter",
  "Saturn",
  "Uranus",
  "Neptune",
  "Pluto",
  "Rahu",
  "Ketu",
] as const;

export type PlanetId = (typeof PLANET_ORDER)[number];

/** Ketu is derived from Rahu and never requested from the engine. */
export type EnginePlanetId = Exclude<PlanetId, "Ketu">;

export const ENGINE_PLANETS: readonly EnginePlanetId[] = PLANET_ORDER.filter(
  (planet): planet is EnginePlanetId => planet !== "Ketu"
);

export interface PlanetInfo {
  symbol: string;
  name_vi: string;
}

export const PLANETS: Record<PlanetId, PlanetInfo> = {
  Sun: { symbol: "☉", name_vi: "Mặt Trời" },
  Moon: { symbol: "☽", name_vi: "Mặt Trăng" },
  Mercury: { symbol: "☿", name_vi: "Sao Thủy" },
  Venus: { symbol: "♀", name_vi: "Sao Kim" },
  Mars: { symbol: "♂", name_vi: "Sao Hỏa" },
  Jupiter: { symbol: "♃", name_vi: "Sao Mộc" },
  Saturn: { symbol: "♄", name_vi: "Sao Thổ" },
  Uranus: { symbol: "♅", name_vi: "Sao Thiên Vương" },
  Neptune: { symbol: "♆", name_vi: "Sao Hải Vương" },
  Pluto: { symbol: "♇", name_vi: "Sao Diêm Vương" },
  Rahu: { symbol: "☊", name_vi: "Rahu (Bắc Giao Điểm)" },
  Ketu: { symbol: "☋", name_vi: "Ketu (Nam Giao Điểm)" },
};

export const SIGN_NAMES = [
  "Aries",
  "Taurus",
  "Gemini",
  "Cancer",
  "Leo",
  "Virgo",
  "Libra",
  "Scorpio",
  "Sagittarius",
  "Capricorn",
  "Aquarius",
  "Pisces",
] as const;

export type SignName = (typeof SIGN_NAMES)[number];

export const SIGN_NAMES_VI = [
  "Bạch Dương",
  "Kim Ngưu",
  "Song Tử",
  "Cự Giải",
  "Sư Tử",
  "Xử Nữ",
  "Thiên Bình",
  "Thần Nông",
  "Nhân Mã",
  "Ma Kết",
  "Bảo Bình",
  "Song Ngư",
] as const;
