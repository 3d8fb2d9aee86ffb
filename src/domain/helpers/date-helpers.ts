/**
 * Datas da PlugBoleto chegam como "dd/mm/aaaa" ou "dd/mm/aaaa HH:MM:SS".
 */

const BR_DATE = /^(\d{2})\/(\d{2})\/(\d{4})$/;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Retorna apenas a parte da data em ISO (aaaa-mm-dd).
 * Aceita formato brasileiro ou ISO, com ou sem horário.
 * Entradas vazias ou não reconhecidas retornam string vazia.
 */
export function toIsoDate(value: string | null | undefined): string {
  if (!value) {
    return '';
  }

  const [datePart] = value.trim().split(/[ T]/);

  const br = datePart.match(BR_DATE);
  if (br) {
    const [, day, month, year] = br;
    return `${year}-${month}-${day}`;
  }

  if (ISO_DATE.test(datePart)) {
    return datePart;
  }

  return '';
}

/**
 * Converte "dd/mm/aaaa HH:MM:SS" em "aaaa-mm-dd HH:MM:SS".
 * Sem horário, retorna só a data.
 */
export function toIsoDateTime(value: string | null | undefined): string {
  if (!value) {
    return '';
  }

  const [, time] = value.trim().split(' ');
  const date = toIsoDate(value);
  return time ? `${date} ${time}` : date;
}
