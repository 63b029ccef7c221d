/**
 * Student Provisioning - Portal Form Encoding
 *
 * The portal is a JSF application; the POST must replay the form exactly
 * as its AJAX submit button sends it.
 */

import type { DocumentQuery } from './types';

export const VIEW_STATE_FIELD = 'javax.faces.ViewState';

/**
 * Month shown by the date picker, `MM/YYYY` in local time.
 */
export function currentMonth(now: Date): string {
    const month = String(now.getMonth() + 1).padStart(2, '0');
    return `${month}/${now.getFullYear()}`;
}

export function buildValidationForm(query: DocumentQuery, viewState: string, now: Date): URLSearchParams {
    return new URLSearchParams([
        ['AJAXREQUEST', '_viewRoot'],
        ['gnosys-filtro_link_hidden_', 'gnosys-filtro-campos'],
        ['alunoMatricula', query.identifier],
        ['situacaoMatricula', 'A'],
        ['dataAutenticacaoInputDate', query.date],
        ['dataAutenticacaoCurrentDate', currentMonth(now)],
        ['hora', query.time],
        ['assinatura', query.signatureCode],
        ['gnosys-filtro', 'gnosys-filtro'],
        ['autoScroll', ''],
        [VIEW_STATE_FIELD, viewState],
        ['btnValidarDocumento', 'btnValidarDocumento'],
        ['', ''],
    ]);
}
