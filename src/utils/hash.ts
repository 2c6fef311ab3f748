// =============================================================================
// Password hashing — bcrypt wrapper.
//
// Rule: no other file in this codebase calls bcrypt directly.
// =============================================================================

import bcrypt from 'bcryptjs';

const SALT_ROUNDS = 12;

export async function hashPassword(plain: string): Promise<string> {
    return bcrypt.hash(plain, SALT_ROUNDS);
}

/** bcrypt.compare is timing-safe; never compare hashes with === . */
export async function verifyPassword(
    plain: string,
    hash: string
): Promise<boolean> {
    return bcrypt.compare(plain, hash);
}

/**
 * A valid hash of a throwaway value.  Login compares against it when the
 * email is unknown so the response time does not reveal which emails exist.
 */
export const DUMMY_PASSWORD_HASH = bcrypt.hashSync('dummy-password-for-timing', SALT_ROUNDS);
