/** Engine version exposed to mods as `<lib>.version` */
export const VERSION = '0.1.0'
