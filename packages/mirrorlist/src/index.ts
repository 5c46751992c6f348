export { countCountries, renderCountryReport } from './countries';
export { MIRRORLIST_BANNER, renderMirrorlist, serverLine } from './mirrorlist';
export type { CountryCount, MirrorlistOptions } from './types';
