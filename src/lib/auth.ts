import { supabase } from './supabase';
import type { SessionCache } from './sessionCache';
import { clearAll as clearStorage } from './storage';

export type AuthResult = { error: string | null };

export async function signInWithPassword(email: string, password: string): Promise<AuthResult> {
  const { error } = await supabase.auth.signInWithPassword({ email: email.trim(), password });
  if (error) console.warn('[auth] sign-in failed', error.message);
  return { error: error ? error.message : null };
}

export async function signUp(email: string, password: string, displayName: string): Promise<AuthResult> {
  const { error } = await supabase.auth.signUp({
    email: email.trim(),
    password,
    options: { data: { display_name: displayName.trim() } },
  });
  if (error) console.warn('[auth] sign-up failed', error.message);
  return { error: error ? error.message : null };
}

/**
 * Ends the Supabase session and wipes everything held for the user: the in-memory session cache
 * and every persisted preference. Local state is cleared even when the remote sign-out fails.
 */
export async function signOut(cache: SessionCache): Promise<AuthResult> {
  const { error } = await supabase.auth.signOut();
  if (error) console.warn('[auth] remote sign-out failed', error.message);
  cache.clearAll();
  clearStorage();
  return { error: error ? error.message : null };
}

export async function currentUserEmail(): Promise<string | null> {
  const { data } = await supabase.auth.getSession();
  return data.session?.user.email ?? null;
}
