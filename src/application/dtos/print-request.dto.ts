/**
 * Tipos de impressão
 *  0 - PDF normal
 *  1 - carnê duplo (paisagem)
 *  2 - carnê triplo (retrato)
 *  3 - dupla (retrato)
 *  4 - normal com marca d'água
 * 99 - personalizada
 */
export type PrintMode = '0' | '1' | '2' | '3' | '4' | '99';

export type PrintLayout = Record<string, unknown>;

/** Ids de integração ou personalização de layout (tipo 99) */
export type PrintTarget = string[] | PrintLayout;
