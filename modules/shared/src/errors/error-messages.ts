/**
 * Student Provisioning - Error Messages
 *
 * Messages shown to students, in Portuguese as displayed by the
 * registration page. Operators read the English log messages instead.
 */

import type { RegistrationField } from './registration-error-codes';

export const ErrorMessages = {
    WEAK_SECRET:
        'A senha precisa ter entre 8 e 25 caracteres, uma letra minúscula, uma maiúscula e um dígito',
    PORTAL_FAILURE: 'Não foi possível obter informações do SIGA',
    DOCUMENT_INVALID: 'Seu documento de matrícula é inválido',
    DIRECTORY_FAILURE: 'Houve um problema ao verificar o estado do cadastro no LDAP',
    DIRECTORY_RETRY: 'O cadastro não pôde ser concluído agora, tente novamente',
    CANCELLED: 'O cadastro foi cancelado',
    INVALID_BODY: 'Corpo da requisição inválido',
    SERVER_ERROR: 'Ocorreu um erro inesperado',
} as const;

/**
 * Per-field labels used in "invalid field" messages.
 */
const FIELD_LABELS: Record<RegistrationField, string> = {
    identifier: 'O DRE',
    date: 'A data',
    time: 'A hora',
    signatureCode: 'O código',
    name: 'O nome',
    email: 'O email',
    phone: 'O telefone',
    username: 'O nome de usuário',
};

export function invalidFieldMessage(field: RegistrationField, value: string): string {
    return `${FIELD_LABELS[field]} ${JSON.stringify(value)} não é válido`;
}

export function otherProgramMessage(program: string): string {
    return `Alunos de ${program} não têm direito a esta conta`;
}

export function alreadyRegisteredMessage(username: string): string {
    return `O cadastro já existe, com o username ${JSON.stringify(username)}`;
}

export function nameMismatchMessage(reported: string, official: string): string {
    return `O nome informado ${JSON.stringify(reported)} não é o mesmo do SIGA ${JSON.stringify(official)}`;
}
