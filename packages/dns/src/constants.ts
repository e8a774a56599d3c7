export const TypeCode = {
  A: 1, // Host address
  NS: 2, // Authoritative name server
  MD: 3, // Mail destination (obsolete)
  MF: 4, // Mail forwarder (obsolete)
  CNAME: 5, // Canonical name
  SOA: 6, // Start of authority
  MB: 7, // Mailbox domain name
  MG: 8, // Mail group member
  MR: 9, // Mail rename domain name
  NULL: 10, // Null record
  WKS: 11, // Well known service
  PTR: 12, // Pointer
  HINFO: 13, // Host information
  MINFO: 14, // Mailbox information
  MX: 15, // Mail exchange
  TXT: 16, // Text
} as const;

export const ClassCode = {
  IN: 1, // Internet
  CS: 2, // CSNET (obsolete)
  CH: 3, // Chaos
  HS: 4, // Hesiod
} as const;

export const OpCode = {
  QUERY: 0, // Standard query
  IQUERY: 1, // Inverse query
  STATUS: 2, // Server status request
} as const;

export const RCode = {
  NOERROR: 0, // No error
  FORMERR: 1, // Format error
  SERVFAIL: 2, // Server failure
  NXDOMAIN: 3, // Non-existent domain
  NOTIMP: 4, // Not implemented
  REFUSED: 5, // Query refused
} as const;

export const HEADER_LENGTH = 12;

export const MAX_LABEL_LENGTH = 63;

/**
 * Top two bits of a length byte that mark a compression pointer.
 */
export const POINTER_FLAG = 0xc0;

export const MAX_UDP_MESSAGE_LENGTH = 512;

export const DNS_PORT = 53;
