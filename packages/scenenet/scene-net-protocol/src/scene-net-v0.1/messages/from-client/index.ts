import { SceneNetV01IntroductionMessage } from "./introduction";
import { SceneNetV01InvokeMessage } from "./invoke";

export * from "./introduction";
export * from "./invoke";

export type SceneNetV01ClientMessage = SceneNetV01IntroductionMessage | SceneNetV01InvokeMessage;
