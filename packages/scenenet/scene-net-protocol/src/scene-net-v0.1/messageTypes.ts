// Client -> Server
export const IntroductionMessageType = 0;
export const InvokeMessageType = 1;

// Server -> Client
export const EntityCreateMessageType = 4;
export const EntityUpdateMessageType = 5;
export const EntityDeleteMessageType = 6;

export const BufferCreateMessageType = 10;
export const BufferDeleteMessageType = 11;

export const BufferViewCreateMessageType = 12;
export const BufferViewDeleteMessageType = 13;

export const MaterialCreateMessageType = 14;
export const MaterialUpdateMessageType = 15;
export const MaterialDeleteMessageType = 16;

export const ImageCreateMessageType = 17;
export const ImageDeleteMessageType = 18;

export const TextureCreateMessageType = 19;
export const TextureDeleteMessageType = 20;

export const GeometryCreateMessageType = 26;
export const GeometryDeleteMessageType = 27;

export const SnapshotCompleteMessageType = 35;
