const SPHERES = ["Land", "Subterranean", "Sea", "Sky"] as const;

export const FIRST_CRYPT_AREA = 0x4;
export const LAST_CRYPT_AREA = 0xb;

export function isCryptArea(area: number): boolean {
  return area >= FIRST_CRYPT_AREA && area <= LAST_CRYPT_AREA;
}

export function areaName(area: number): string {
  if (area < 0x4) return `${SPHERES[area]} Sphere`;
  if (isCryptArea(area)) return `Crypt ${area - FIRST_CRYPT_AREA + 1}`;
  if (area < 0x10) return `${SPHERES[area - 0xc]} Sphere Rooms`;
  if (area === 0x10) return "Endgame";
  return `Area 0x${area.toString(16).padStart(2, "0")}`;
}
