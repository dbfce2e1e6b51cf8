// LDAP Protocol Implementation
// BER/LDAP v3 subset for a read-only client (Bind, Search, Unbind, Simple Paged Results)
import {
  BaseBlock,
  Boolean as Asn1Boolean,
  Constructed,
  Enumerated,
  fromBER,
  Integer,
  OctetString,
  Primitive,
  Sequence,
  Set as Asn1Set,
} from "asn1js";

// LDAP Message Types (APPLICATION tag numbers)
export enum LDAPMessageType {
  BindRequest = 0,
  BindResponse = 1,
  UnbindRequest = 2,
  SearchRequest = 3,
  SearchResultEntry = 4,
  SearchResultDone = 5,
  SearchResultReference = 19,
  ExtendedResponse = 24,
}

// LDAP Result Codes
export enum LDAPResultCode {
  Success = 0,
  OperationsError = 1,
  ProtocolError = 2,
  TimeLimitExceeded = 3,
  SizeLimitExceeded = 4,
  CompareFalse = 5,
  CompareTrue = 6,
  AuthMethodNotSupported = 7,
  StrongerAuthRequired = 8,
  Referral = 10,
  AdminLimitExceeded = 11,
  UnavailableCriticalExtension = 12,
  ConfidentialityRequired = 13,
  SaslBindInProgress = 14,
  NoSuchAttribute = 16,
  UndefinedAttributeType = 17,
  InappropriateMatching = 18,
  NoSuchObject = 32,
  InvalidDNSyntax = 34,
  InappropriateAuthentication = 48,
  InvalidCredentials = 49,
  InsufficientAccessRights = 50,
  Busy = 51,
  Unavailable = 52,
  UnwillingToPerform = 53,
  LoopDetect = 54,
  NamingViolation = 64,
  ObjectClassViolation = 65,
  NotAllowedOnNonLeaf = 66,
  NotAllowedOnRdn = 67,
  EntryAlreadyExists = 68,
  ObjectClassModsProhibited = 69,
  AffectsMultipleDsas = 71,
  Other = 80,
}

// LDAP Search Scope
export enum SearchScope {
  BaseObject = 0,
  SingleLevel = 1,
  WholeSubtree = 2,
}

// LDAP Search Deref Aliases
export enum DerefAliases {
  NeverDerefAliases = 0,
  DerefInSearching = 1,
  DerefFindingBaseObj = 2,
  DerefAlways = 3,
}

// LDAP Filter Types (context-specific tag numbers)
export enum FilterType {
  And = 0,
  Or = 1,
  Not = 2,
  EqualityMatch = 3,
  Substrings = 4,
  GreaterOrEqual = 5,
  LessOrEqual = 6,
  Present = 7,
  ApproxMatch = 8,
  ExtensibleMatch = 9,
}

// RFC 2696 Simple Paged Results control
export const PAGED_RESULTS_OID = "1.2.840.113556.1.4.319";

// Unsolicited notification sent before the server drops a connection (RFC 4511 4.4.1)
export const NOTICE_OF_DISCONNECTION_OID = "1.3.6.1.4.1.1466.20036";

const TAG_CLASS_APPLICATION = 2;
const TAG_CLASS_CONTEXT = 3;

// Basic LDAP Message Structure
export interface LDAPMessage {
  messageID: number;
  protocolOp: LDAPProtocolOp;
  controls?: LDAPControl[];
}

export interface LDAPControl {
  controlType: string;
  criticality?: boolean;
  controlValue?: Uint8Array;
}

export type LDAPRequestOp = BindRequest | UnbindRequest | SearchRequest;

export type LDAPResponseOp =
  | BindResponse
  | SearchResultEntry
  | SearchResultReference
  | SearchResultDone
  | ExtendedResponse;

export type LDAPProtocolOp = LDAPRequestOp | LDAPResponseOp;

export interface BindRequest {
  type: LDAPMessageType.BindRequest;
  version: number;
  name: string; // DN
  authentication: SimpleAuthentication | SaslAuthentication;
}

export interface SimpleAuthentication {
  type: "simple";
  password: Uint8Array;
}

export interface SaslAuthentication {
  type: "sasl";
  mechanism: string;
  credentials?: Uint8Array;
}

export interface LDAPResult {
  resultCode: LDAPResultCode;
  matchedDN: string;
  diagnosticMessage: string;
  referral?: string[];
}

export interface BindResponse extends LDAPResult {
  type: LDAPMessageType.BindResponse;
  serverSaslCreds?: Uint8Array;
}

export interface UnbindRequest {
  type: LDAPMessageType.UnbindRequest;
}

export interface SearchRequest {
  type: LDAPMessageType.SearchRequest;
  baseObject: string; // DN
  scope: SearchScope;
  derefAliases: DerefAliases;
  sizeLimit: number;
  timeLimit: number;
  typesOnly: boolean;
  filter: Filter;
  attributes: string[];
}

export interface SearchResultEntry {
  type: LDAPMessageType.SearchResultEntry;
  objectName: string; // DN
  attributes: PartialAttribute[];
}

export interface SearchResultReference {
  type: LDAPMessageType.SearchResultReference;
  uris: string[];
}

export interface SearchResultDone extends LDAPResult {
  type: LDAPMessageType.SearchResultDone;
}

export interface ExtendedResponse extends LDAPResult {
  type: LDAPMessageType.ExtendedResponse;
  responseName?: string;
}

export interface PartialAttribute {
  type: string; // attribute description
  vals: Uint8Array[];
}

// Filter definitions
export type Filter =
  | AndFilter
  | OrFilter
  | NotFilter
  | EqualityMatchFilter
  | SubstringsFilter
  | PresentFilter
  | GreaterOrEqualFilter
  | LessOrEqualFilter
  | ApproxMatchFilter
  | ExtensibleMatchFilter;

export interface AndFilter {
  type: FilterType.And;
  filters: Filter[];
}

export interface OrFilter {
  type: FilterType.Or;
  filters: Filter[];
}

export interface NotFilter {
  type: FilterType.Not;
  filter: Filter;
}

export interface EqualityMatchFilter {
  type: FilterType.EqualityMatch;
  attributeDesc: string;
  assertionValue: Uint8Array;
}

export interface SubstringsFilter {
  type: FilterType.Substrings;
  attributeDesc: string;
  initial?: Uint8Array;
  any: Uint8Array[];
  final?: Uint8Array;
}

export interface PresentFilter {
  type: FilterType.Present;
  attributeDesc: string;
}

export interface GreaterOrEqualFilter {
  type: FilterType.GreaterOrEqual;
  attributeDesc: string;
  assertionValue: Uint8Array;
}

export interface LessOrEqualFilter {
  type: FilterType.LessOrEqual;
  attributeDesc: string;
  assertionValue: Uint8Array;
}

export interface ApproxMatchFilter {
  type: FilterType.ApproxMatch;
  attributeDesc: string;
  assertionValue: Uint8Array;
}

export interface ExtensibleMatchFilter {
  type: FilterType.ExtensibleMatch;
  matchingRule?: string;
  attributeDesc?: string;
  matchValue: Uint8Array;
  dnAttributes: boolean;
}

export interface PagedResultsValue {
  size: number;
  cookie: Uint8Array;
}

export class LDAPProtocolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LDAPProtocolError";
  }
}

// ---------- Helpers ----------
const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder();

export function utf8(value: string): Uint8Array {
  return textEncoder.encode(value);
}

export function fromUtf8(value: Uint8Array): string {
  return textDecoder.decode(value);
}

function childrenOf(block: unknown, what: string): BaseBlock[] {
  if (!(block instanceof Constructed)) throw new LDAPProtocolError(`${what} must be constructed`);
  return block.valueBlock.value;
}

function integerOf(block: unknown, what: string): number {
  // Enumerated extends Integer
  if (!(block instanceof Integer)) throw new LDAPProtocolError(`${what} must be an Integer`);
  return block.valueBlock.valueDec;
}

function booleanOf(block: unknown, what: string): boolean {
  if (!(block instanceof Asn1Boolean)) throw new LDAPProtocolError(`${what} must be a Boolean`);
  return block.valueBlock.value;
}

function bytesOf(block: unknown, what: string): Uint8Array {
  if (block instanceof OctetString || block instanceof Primitive) {
    return block.valueBlock.valueHexView.slice();
  }
  throw new LDAPProtocolError(`${what} must be an OctetString`);
}

function stringOf(block: unknown, what: string): string {
  return fromUtf8(bytesOf(block, what));
}

function isTagged(block: unknown, tagClass: number, tagNumber: number): block is BaseBlock {
  return block instanceof BaseBlock && block.idBlock.tagClass === tagClass && block.idBlock.tagNumber === tagNumber;
}

function octets(value: Uint8Array | string): OctetString {
  return new OctetString({ valueHex: typeof value === "string" ? utf8(value) : value });
}

function contextPrimitive(tagNumber: number, value: Uint8Array | string): Primitive {
  return new Primitive({
    idBlock: { tagClass: TAG_CLASS_CONTEXT, tagNumber },
    valueHex: typeof value === "string" ? utf8(value) : value,
  });
}

function tagged(tagClass: number, tagNumber: number, value: BaseBlock[]): Constructed {
  return new Constructed({ idBlock: { tagClass, tagNumber }, value });
}

function encodeResult(result: LDAPResult): BaseBlock[] {
  const value: BaseBlock[] = [
    new Enumerated({ value: result.resultCode }),
    octets(result.matchedDN),
    octets(result.diagnosticMessage),
  ];
  if (result.referral && result.referral.length > 0) {
    value.push(tagged(TAG_CLASS_CONTEXT, 3, result.referral.map((uri) => octets(uri))));
  }
  return value;
}

function decodeResult(seq: BaseBlock[], what: string): LDAPResult {
  if (seq.length < 3) throw new LDAPProtocolError(`${what} must contain resultCode, matchedDN and diagnosticMessage`);
  const result: LDAPResult = {
    resultCode: integerOf(seq[0], `${what} resultCode`),
    matchedDN: stringOf(seq[1], `${what} matchedDN`),
    diagnosticMessage: stringOf(seq[2], `${what} diagnosticMessage`),
  };
  const referral = seq.slice(3).find((b) => isTagged(b, TAG_CLASS_CONTEXT, 3));
  if (referral) {
    result.referral = childrenOf(referral, "Referral").map((b) => stringOf(b, "Referral URI"));
  }
  return result;
}

function decodeAssertion(block: BaseBlock): { attributeDesc: string; assertionValue: Uint8Array } {
  const seq = childrenOf(block, "Attribute value assertion");
  return {
    attributeDesc: stringOf(seq[0], "Assertion attribute"),
    assertionValue: bytesOf(seq[1], "Assertion value"),
  };
}

// ---------- Codec ----------
export class LDAPCodec {
  static encode(message: LDAPMessage): Uint8Array {
    const value: BaseBlock[] = [new Integer({ value: message.messageID }), this.encodeProtocolOp(message.protocolOp)];

    if (message.controls && message.controls.length > 0) {
      const ctrlBlocks = message.controls.map((c) => {
        const ctrlValue: BaseBlock[] = [octets(c.controlType)];
        // criticality is DEFAULT FALSE, so only TRUE is written
        if (c.criticality) ctrlValue.push(new Asn1Boolean({ value: true }));
        if (c.controlValue) ctrlValue.push(octets(c.controlValue));
        return new Sequence({ value: ctrlValue });
      });
      value.push(tagged(TAG_CLASS_CONTEXT, 0, ctrlBlocks));
    }

    return new Uint8Array(new Sequence({ value }).toBER(false));
  }

  static decode(data: Uint8Array): LDAPMessage {
    const result = fromBER(data);
    if (result.offset === -1) {
      throw new LDAPProtocolError("Failed to decode BER");
    }

    const blocks = childrenOf(result.result, "LDAPMessage");
    if (blocks.length < 2) {
      throw new LDAPProtocolError("Invalid LDAPMessage structure");
    }

    const messageID = integerOf(blocks[0], "messageID");
    const protocolOp = this.decodeProtocolOp(blocks[1]);
    const controlsBlock = blocks[2];
    if (isTagged(controlsBlock, TAG_CLASS_CONTEXT, 0)) {
      return { messageID, protocolOp, controls: this.decodeControls(controlsBlock) };
    }
    return { messageID, protocolOp };
  }

  private static encodeProtocolOp(op: LDAPProtocolOp): BaseBlock {
    switch (op.type) {
      case LDAPMessageType.BindRequest: {
        const auth = op.authentication.type === "simple"
          ? contextPrimitive(0, op.authentication.password)
          : tagged(TAG_CLASS_CONTEXT, 3, [
            octets(op.authentication.mechanism),
            ...(op.authentication.credentials ? [octets(op.authentication.credentials)] : []),
          ]);
        return tagged(TAG_CLASS_APPLICATION, op.type, [new Integer({ value: op.version }), octets(op.name), auth]);
      }

      case LDAPMessageType.BindResponse: {
        const value = encodeResult(op);
        if (op.serverSaslCreds) value.push(contextPrimitive(7, op.serverSaslCreds));
        return tagged(TAG_CLASS_APPLICATION, op.type, value);
      }

      case LDAPMessageType.UnbindRequest:
        return new Primitive({ idBlock: { tagClass: TAG_CLASS_APPLICATION, tagNumber: op.type } });

      case LDAPMessageType.SearchRequest:
        return tagged(TAG_CLASS_APPLICATION, op.type, [
          octets(op.baseObject),
          new Enumerated({ value: op.scope }),
          new Enumerated({ value: op.derefAliases }),
          new Integer({ value: op.sizeLimit }),
          new Integer({ value: op.timeLimit }),
          new Asn1Boolean({ value: op.typesOnly }),
          this.encodeFilter(op.filter),
          new Sequence({ value: op.attributes.map((a) => octets(a)) }),
        ]);

      case LDAPMessageType.SearchResultEntry: {
        const attrs = op.attributes.map((a) =>
          new Sequence({
            value: [octets(a.type), new Asn1Set({ value: a.vals.map((v) => octets(v)) })],
          })
        );
        return tagged(TAG_CLASS_APPLICATION, op.type, [octets(op.objectName), new Sequence({ value: attrs })]);
      }

      case LDAPMessageType.SearchResultReference:
        return tagged(TAG_CLASS_APPLICATION, op.type, op.uris.map((uri) => octets(uri)));

      case LDAPMessageType.SearchResultDone:
        return tagged(TAG_CLASS_APPLICATION, op.type, encodeResult(op));

      case LDAPMessageType.ExtendedResponse: {
        const value = encodeResult(op);
        if (op.responseName) value.push(contextPrimitive(10, op.responseName));
        return tagged(TAG_CLASS_APPLICATION, op.type, value);
      }
    }
  }

  private static decodeProtocolOp(block: unknown): LDAPProtocolOp {
    if (!(block instanceof BaseBlock) || block.idBlock.tagClass !== TAG_CLASS_APPLICATION) {
      throw new LDAPProtocolError("protocolOp must use an APPLICATION tag");
    }

    switch (block.idBlock.tagNumber) {
      case LDAPMessageType.BindRequest: {
        const seq = childrenOf(block, "BindRequest");
        if (seq.length < 3) throw new LDAPProtocolError("BindRequest must contain version, name, and authentication");
        const authBlock = seq[2];
        let authentication: SimpleAuthentication | SaslAuthentication;
        if (isTagged(authBlock, TAG_CLASS_CONTEXT, 0)) {
          authentication = { type: "simple", password: bytesOf(authBlock, "Simple password") };
        } else if (isTagged(authBlock, TAG_CLASS_CONTEXT, 3)) {
          const sasl = childrenOf(authBlock, "SASL credentials");
          authentication = {
            type: "sasl",
            mechanism: stringOf(sasl[0], "SASL mechanism"),
            ...(sasl[1] ? { credentials: bytesOf(sasl[1], "SASL credentials") } : {}),
          };
        } else {
          throw new LDAPProtocolError("Unsupported authentication choice in BindRequest");
        }
        return {
          type: LDAPMessageType.BindRequest,
          version: integerOf(seq[0], "BindRequest version"),
          name: stringOf(seq[1], "BindRequest name"),
          authentication,
        };
      }

      case LDAPMessageType.BindResponse: {
        const seq = childrenOf(block, "BindResponse");
        const creds = seq.slice(3).find((b) => isTagged(b, TAG_CLASS_CONTEXT, 7));
        return {
          type: LDAPMessageType.BindResponse,
          ...decodeResult(seq, "BindResponse"),
          ...(creds ? { serverSaslCreds: bytesOf(creds, "serverSaslCreds") } : {}),
        };
      }

      case LDAPMessageType.UnbindRequest:
        return { type: LDAPMessageType.UnbindRequest };

      case LDAPMessageType.SearchRequest: {
        const seq = childrenOf(block, "SearchRequest");
        if (seq.length < 8) throw new LDAPProtocolError("SearchRequest must contain required fields");
        return {
          type: LDAPMessageType.SearchRequest,
          baseObject: stringOf(seq[0], "SearchRequest baseObject"),
          scope: integerOf(seq[1], "SearchRequest scope"),
          derefAliases: integerOf(seq[2], "SearchRequest derefAliases"),
          sizeLimit: integerOf(seq[3], "SearchRequest sizeLimit"),
          timeLimit: integerOf(seq[4], "SearchRequest timeLimit"),
          typesOnly: booleanOf(seq[5], "SearchRequest typesOnly"),
          filter: this.decodeFilter(seq[6]),
          attributes: childrenOf(seq[7], "SearchRequest attributes").map((a) => stringOf(a, "Attribute selector")),
        };
      }

      case LDAPMessageType.SearchResultEntry: {
        const seq = childrenOf(block, "SearchResultEntry");
        const attributes = childrenOf(seq[1], "SearchResultEntry attributes").map((attr) => {
          const parts = childrenOf(attr, "PartialAttribute");
          return {
            type: stringOf(parts[0], "Attribute description"),
            vals: childrenOf(parts[1], "Attribute values").map((v) => bytesOf(v, "Attribute value")),
          };
        });
        return {
          type: LDAPMessageType.SearchResultEntry,
          objectName: stringOf(seq[0], "SearchResultEntry objectName"),
          attributes,
        };
      }

      case LDAPMessageType.SearchResultReference:
        return {
          type: LDAPMessageType.SearchResultReference,
          uris: childrenOf(block, "SearchResultReference").map((b) => stringOf(b, "Reference URI")),
        };

      case LDAPMessageType.SearchResultDone:
        return { type: LDAPMessageType.SearchResultDone, ...decodeResult(childrenOf(block, "SearchResultDone"), "SearchResultDone") };

      case LDAPMessageType.ExtendedResponse: {
        const seq = childrenOf(block, "ExtendedResponse");
        const name = seq.slice(3).find((b) => isTagged(b, TAG_CLASS_CONTEXT, 10));
        return {
          type: LDAPMessageType.ExtendedResponse,
          ...decodeResult(seq, "ExtendedResponse"),
          ...(name ? { responseName: stringOf(name, "responseName") } : {}),
        };
      }

      default:
        throw new LDAPProtocolError(`Unsupported LDAP message type ${block.idBlock.tagNumber}`);
    }
  }

  private static decodeControls(block: BaseBlock): LDAPControl[] {
    return childrenOf(block, "Controls").map((c) => {
      const seq = childrenOf(c, "Control");
      const control: LDAPControl = { controlType: stringOf(seq[0], "controlType") };
      for (const part of seq.slice(1)) {
        if (part instanceof Asn1Boolean) {
          control.criticality = part.valueBlock.value;
        } else {
          control.controlValue = bytesOf(part, "controlValue");
        }
      }
      return control;
    });
  }

  static encodeFilter(filter: Filter): BaseBlock {
    switch (filter.type) {
      case FilterType.And:
      case FilterType.Or:
        return tagged(TAG_CLASS_CONTEXT, filter.type, filter.filters.map((f) => this.encodeFilter(f)));

      case FilterType.Not:
        return tagged(TAG_CLASS_CONTEXT, filter.type, [this.encodeFilter(filter.filter)]);

      case FilterType.EqualityMatch:
      case FilterType.GreaterOrEqual:
      case FilterType.LessOrEqual:
      case FilterType.ApproxMatch:
        return tagged(TAG_CLASS_CONTEXT, filter.type, [octets(filter.attributeDesc), octets(filter.assertionValue)]);

      case FilterType.Substrings: {
        const parts: BaseBlock[] = [];
        if (filter.initial) parts.push(contextPrimitive(0, filter.initial));
        for (const any of filter.any) parts.push(contextPrimitive(1, any));
        if (filter.final) parts.push(contextPrimitive(2, filter.final));
        return tagged(TAG_CLASS_CONTEXT, filter.type, [octets(filter.attributeDesc), new Sequence({ value: parts })]);
      }

      case FilterType.Present:
        return contextPrimitive(filter.type, filter.attributeDesc);

      case FilterType.ExtensibleMatch: {
        const parts: BaseBlock[] = [];
        if (filter.matchingRule) parts.push(contextPrimitive(1, filter.matchingRule));
        if (filter.attributeDesc) parts.push(contextPrimitive(2, filter.attributeDesc));
        parts.push(contextPrimitive(3, filter.matchValue));
        if (filter.dnAttributes) parts.push(contextPrimitive(4, new Uint8Array([0xff])));
        return tagged(TAG_CLASS_CONTEXT, filter.type, parts);
      }
    }
  }

  static decodeFilter(block: unknown): Filter {
    if (!(block instanceof BaseBlock) || block.idBlock.tagClass !== TAG_CLASS_CONTEXT) {
      throw new LDAPProtocolError("Filter must use a context-specific tag");
    }

    switch (block.idBlock.tagNumber) {
      case FilterType.And:
        return { type: FilterType.And, filters: childrenOf(block, "And filter").map((b) => this.decodeFilter(b)) };

      case FilterType.Or:
        return { type: FilterType.Or, filters: childrenOf(block, "Or filter").map((b) => this.decodeFilter(b)) };

      case FilterType.Not:
        return { type: FilterType.Not, filter: this.decodeFilter(childrenOf(block, "Not filter")[0]) };

      case FilterType.EqualityMatch:
        return { type: FilterType.EqualityMatch, ...decodeAssertion(block) };

      case FilterType.GreaterOrEqual:
        return { type: FilterType.GreaterOrEqual, ...decodeAssertion(block) };

      case FilterType.LessOrEqual:
        return { type: FilterType.LessOrEqual, ...decodeAssertion(block) };

      case FilterType.ApproxMatch:
        return { type: FilterType.ApproxMatch, ...decodeAssertion(block) };

      case FilterType.Substrings: {
        const seq = childrenOf(block, "Substrings filter");
        const filter: SubstringsFilter = {
          type: FilterType.Substrings,
          attributeDesc: stringOf(seq[0], "Substrings attribute"),
          any: [],
        };
        for (const part of childrenOf(seq[1], "Substrings list")) {
          const value = bytesOf(part, "Substring component");
          if (part.idBlock.tagNumber === 0) filter.initial = value;
          else if (part.idBlock.tagNumber === 1) filter.any.push(value);
          else if (part.idBlock.tagNumber === 2) filter.final = value;
        }
        return filter;
      }

      case FilterType.Present:
        return { type: FilterType.Present, attributeDesc: stringOf(block, "Present attribute") };

      case FilterType.ExtensibleMatch: {
        const filter: ExtensibleMatchFilter = {
          type: FilterType.ExtensibleMatch,
          matchValue: new Uint8Array(),
          dnAttributes: false,
        };
        for (const part of childrenOf(block, "Extensible match")) {
          const value = bytesOf(part, "Extensible match component");
          switch (part.idBlock.tagNumber) {
            case 1:
              filter.matchingRule = fromUtf8(value);
              break;
            case 2:
              filter.attributeDesc = fromUtf8(value);
              break;
            case 3:
              filter.matchValue = value;
              break;
            case 4:
              filter.dnAttributes = value.length > 0 && value[0] !== 0;
              break;
          }
        }
        return filter;
      }

      default:
        throw new LDAPProtocolError(`Unsupported or unrecognized filter tag ${block.idBlock.tagNumber}`);
    }
  }

  // Build the BER-encoded controlValue for the Simple Paged Results control:
  // SEQUENCE { size INTEGER, cookie OCTET STRING }
  static encodePagedResultsValue(size: number, cookie: Uint8Array = new Uint8Array()): Uint8Array {
    const seq = new Sequence({ value: [new Integer({ value: size }), octets(cookie)] });
    return new Uint8Array(seq.toBER(false));
  }

  static decodePagedResultsValue(value: Uint8Array): PagedResultsValue {
    const result = fromBER(value);
    if (result.offset === -1) {
      throw new LDAPProtocolError("Failed to decode paged results control value");
    }
    const seq = childrenOf(result.result, "Paged results control value");
    return {
      size: integerOf(seq[0], "Paged results size"),
      cookie: bytesOf(seq[1], "Paged results cookie"),
    };
  }
}

// Length of the first complete LDAPMessage in `data`, or null until enough bytes
// have arrived. LDAP forbids the indefinite length form (RFC 4511 5.1).
export function frameLength(data: Uint8Array): number | null {
  if (data.length === 0) return null;
  if (data[0] !== 0x30) {
    throw new LDAPProtocolError(`LDAPMessage must start with a SEQUENCE tag, got 0x${data[0].toString(16)}`);
  }
  if (data.length < 2) return null;

  const first = data[1];
  if (first < 0x80) {
    const total = 2 + first;
    return data.length >= total ? total : null;
  }

  const lengthBytes = first & 0x7f;
  if (lengthBytes === 0) throw new LDAPProtocolError("Indefinite length form is not allowed");
  if (lengthBytes > 4) throw new LDAPProtocolError(`Unsupported length of ${lengthBytes} bytes`);
  if (data.length < 2 + lengthBytes) return null;

  let length = 0;
  for (let i = 0; i < lengthBytes; i++) {
    length = length * 256 + data[2 + i];
  }
  const total = 2 + lengthBytes + length;
  return data.length >= total ? total : null;
}

export function isFinalResponse(op: LDAPProtocolOp): boolean {
  return op.type === LDAPMessageType.BindResponse ||
    op.type === LDAPMessageType.SearchResultDone ||
    op.type === LDAPMessageType.ExtendedResponse;
}

export function resultCodeName(code: number): string {
  return LDAPResultCode[code] ?? `Unknown(${code})`;
}

// LDAP Constants
export const LDAP_VERSION = 3;
export const LDAP_PORT = 389;
export const LDAPS_PORT = 636;
