/**
 * Operating system families the server knows how to provision.
 */

export const OS_FAMILIES = [
  "AIX",
  "Archlinux",
  "Debian",
  "Freebsd",
  "Gentoo",
  "Redhat",
  "Solaris",
  "Suse",
  "Windows",
] as const;

/** Installation media also accept Junos. */
export const MEDIA_OS_FAMILIES = [...OS_FAMILIES, "Junos"].sort();
