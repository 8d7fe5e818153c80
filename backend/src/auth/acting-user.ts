import type { User } from "@supabase/supabase-js";

/** Identity recorded on audit rows. */
export type ActingUser = {
  id: string;
  email: string | null;
};

export function toActingUser(user: User): ActingUser {
  return {
    id: user.id,
    email: user.email ?? null,
  };
}
