// Generic phantom-brand helper
export type Brand<Base, Tag extends string> = Base & { readonly __brand: Tag };

export type Hex = `0x${string}`;

export type XorName = Brand<Hex, "XorName">;
export type MessageId = Brand<Hex, "MessageId">;
export type PublicSignKey = Brand<Hex, "PublicSignKey">;
export type PublicEncryptKey = Brand<Hex, "PublicEncryptKey">;

export const asXorName = (h: Hex): XorName => h as XorName;
export const asMessageId = (h: Hex): MessageId => h as MessageId;
export const asSignKey = (h: Hex): PublicSignKey => h as PublicSignKey;
export const asEncryptKey = (h: Hex): PublicEncryptKey => h as PublicEncryptKey;
