/**
 * Student Provisioning - Portal Response Parsing
 */

import * as cheerio from 'cheerio';
import { PortalContractError } from './errors';
import { VIEW_STATE_FIELD } from './form';
import type { VerificationOutcome } from './types';

const VALID_MARKER = '#msgDocumentoValido';
const INVALID_MARKER = '#msgDocumentoInvalido';
const RESULT_FIELD = '.gnosys-item-visualizacao';

/** Name, registry id, program */
const EXPECTED_RESULT_FIELDS = 3;

export function extractViewState(html: string): string {
    const $ = cheerio.load(html);
    const value = $(`input[name="${VIEW_STATE_FIELD}"]`).first().attr('value');
    if (value === undefined) {
        throw new PortalContractError('missing-view-state', 'Form page has no view state token');
    }
    return value;
}

/**
 * Classify the portal's answer to a validation POST.
 * Scraped text is trimmed.
 */
export function parseValidationResult(html: string, targetProgram: string): VerificationOutcome {
    const $ = cheerio.load(html);
    const valid = $(VALID_MARKER).length > 0;
    const invalid = $(INVALID_MARKER).length > 0;

    if (valid === invalid) {
        throw new PortalContractError(
            'ambiguous-outcome',
            `Expected exactly one outcome marker, found ${valid ? 'both' : 'neither'}`
        );
    }

    if (invalid) {
        return { type: 'DocumentUnrecognized' };
    }

    const fields = $(RESULT_FIELD)
        .toArray()
        .map((element) => $(element).text().trim());

    if (fields.length !== EXPECTED_RESULT_FIELDS) {
        throw new PortalContractError(
            'unexpected-field-count',
            `Expected ${EXPECTED_RESULT_FIELDS} result fields, found ${fields.length}`
        );
    }

    const [officialName, , programName] = fields;
    if (programName === targetProgram) {
        return { type: 'MatchedEnrolledStudent', officialName };
    }
    return { type: 'MatchedOtherProgram', officialName, programName };
}
