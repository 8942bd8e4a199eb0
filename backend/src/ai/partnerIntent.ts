// src/ai/partnerIntent.ts

export type PartnerIntent =   //what a single generation call is for
    | "ROLEPLAY_TURN"
    | "TRANSLATE_GLOSS"
    | "END_FEEDBACK"
