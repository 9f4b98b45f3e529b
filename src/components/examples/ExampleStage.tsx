import React from "react";
import Button from "../ui/Button";
import { logEvent } from "../../utils/logger";

export interface StageAction {
  label: string;
  onPress: () => void;
}

export interface ExampleStageProps {
  children: React.ReactNode;
  /** The single trigger of the screen. Gesture-driven screens pass a caption instead. */
  action?: StageAction;
  caption?: string;
}

/**
 * Vertical stack: the animated shape on top, the trigger underneath.
 */
export const ExampleStage: React.FC<ExampleStageProps> = ({ children, action, caption }) => (
  <div className="stage">
    <div className="stage__canvas">{children}</div>
    {action && (
      <Button
        onClick={() => {
          logEvent("ui.example_trigger", { action: action.label });
          action.onPress();
        }}
      >
        {action.label}
      </Button>
    )}
    {caption && <p className="stage__caption">{caption}</p>}
  </div>
);
