import { runVoiceApp, type VoiceSession } from "../src/index.js";

const DIGITS = "zero | one | two | three | four | five | six | seven | eight | nine";
const WORDS = ["zero", "one", "two", "three", "four", "five", "six", "seven", "eight", "nine"];

async function guessANumber(session: VoiceSession): Promise<void> {
  const secret = Math.floor(Math.random() * 10);
  session.audio("I'm thinking of a number between zero and nine.");

  for (let attempt = 1; attempt <= 3; attempt += 1) {
    const answer = await session.listen({
      grammar: `#ABNF 1.0; root $digit; $digit = ${DIGITS};`,
      nomatch: "",
      timeoutSeconds: 8,
    });
    const guess = WORDS.indexOf(answer.trim().toLowerCase());
    if (guess === secret) {
      session.audio("That's it!");
      await session.disconnect();
      return;
    }
    if (guess < 0) {
      session.audio("Please say a single digit.");
    } else {
      session.audio(guess < secret ? "Higher." : "Lower.");
    }
    session.pause(300);
  }

  session.audio(`Out of guesses. It was ${WORDS[secret]}.`);
  await session.goToUrl("_home");
}

await runVoiceApp(guessANumber, { timeout: 30 });
