/**
 * Description prompt templates, one per channel.
 * `{{transcript}}` is replaced with the video transcript.
 */

export const TRANSCRIPT_PLACEHOLDER = '{{transcript}}'

export const HINDI_DESCRIPTION_TEMPLATE = `You are a professional YouTube content creator for the Trakin Tech channel. Generate a complete YouTube video description in Hindi based on the provided transcript.

Your output should include:
- A one-line Hindi hook at the top describing the video.
- A short summary in Hindi encouraging users to watch, like, and share.
- SEO-friendly hashtags relevant to the video content.
- Camera samples / product links (if mentioned in the transcript, otherwise use dummy placeholders).
- A disclaimer in Hindi if the video is brand-sponsored (as indicated in the transcript).
- Promotional links (for music, Telegram, etc.) in the TrakinTech style.
- A standard block of social media handles.
- Chapter titles with timestamps based on the key topics discussed in the transcript. The chapter titles should be descriptive and follow the example format.

Use this example as a reference for the overall output formatting:

Doston Aaj Hum Unbox Kar Rahe Hain All New iPhone Air Ko, To Aap Ye Video Ant Tak Dekhiye Aur Video Ko Like Aur Share Karna Na Bhoole.

#iPhoneAir #iPhone17Series #iPhoneAirUnboxing #TrakinTech

Check Out iPhone Air : \`https://fkart.openinapp.co/r81su\`

The Device shown in the video has been provided by respective brand. However, opinion mentioned in this video is completely personal and based on my usage only.

"Safar - The 10 Million Rap"
Streaming On All Platforms Listen or Set Your Callertune Enjoy & Stay Connected With Us !
♫ Jio Saavn - \`https://bit.ly/3iWUfm4\`
♫ Gaana - \`https://bit.ly/2YHUdaY\`
♫ Apple Music - \`https://apple.co/3mQfwPy\`
♫ Spotify - \`https://spoti.fi/3oY1bmA\`
♫ Youtube Music - \`https://bit.ly/3Ax2yuF\`
♫ Amazon Music - \`https://amzn.to/3veYSgk\`

Official TrakinTech Telegram Channel - \`https://t.me/officialtrakintech\`

Video Highlights
00:00 Introduction
00:35 Alienware Aurora 16 & 16X Unboxing
01:43 Alienware Aurora 16 & 16X Design
02:05 Alienware Aurora 16 & 16X Ports
03:29 Alienware Aurora 16 & 16X Display
04:25 Alienware Aurora 16 & 16X Specifications
05:52 Alienware Aurora 16 & 16X Multimedia
06:19 Alienware Aurora 16 & 16X Battery
07:02 Alienware Aurora 16 & 16X Software
07:50 Alienware Aurora 16 & 16X Performance
09:04 Alienware Aurora 16 & 16X Connectivity
09:45 Alienware Aurora 16 & 16X Price

Social Media Handles
Follow us on:
Web: \`http://trak.in\`
Telegram : \`https://t.me/officialtrakintech\`
Instagram: \`https://instagram.com/trakintech\`
Twitter: \`https://twitter.com/trakintech\`
Twitter personal: \`https://twitter.com/8ap\`
Facebook: \`https://www.facebook.com/TrakinTech\`
English Trakin Tech YouTube Channel - \`https://www.youtube.com/c/TrakinTechEnglish\`

<Task>
Analyze the provided transcript and generate the complete YouTube description as specified.
</Task>

<Inputs>
<Transcript>
${TRANSCRIPT_PLACEHOLDER}
</Transcript>
</Inputs>

<Instructions>
Carefully analyze the transcript to identify all major topic changes for chapter creation.
Map the identified topics to their start times; estimate them from the flow of the transcript when it carries no timestamps.
Ensure the chapter titles are descriptive, as shown in the example format (e.g., "Alienware Aurora 16 & 16X Design").
Maintain a casual, conversational Hindi tone throughout the description.
Use dummy links for products and promotions if not mentioned in the text.
Wrap the final, complete output inside <video_description> tags.
</Instructions>`

export const MARATHI_DESCRIPTION_TEMPLATE = `<Task>
You are a YouTube video assistant. Based on the following transcript, generate a Marathi YouTube video description in Trakin Tech style.
Your output should include:
A one-line hook in Marathi introducing the video (casual, engaging tone).
A short Marathi description summarizing the video.
SEO-optimized hashtags from product name, series, and video theme.
Buy/product links (if found in transcript, else add a placeholder link).
Disclaimer if mentioned.
Chapter titles with timestamps.
Social Media Handles section in Marathi.
Follow this formatting example:
ह्या video मध्ये आपण iPhone 17 चं unboxing आणि Quick Review घेणार आहोत. हा iPhone खरंच वर्थ आहे का हे detail मध्ये या video मध्ये पाहूया!

Buy iPhone 17 here: \`https://fktr.in/4P86gPb\`

#iPhone17 #iPhone17Unboxing #TrakinTechMarathi

Highlights
0:00 Introduction
0:41 Unboxing
1:04 Design, In-Hand Feel & Build
3:06 Display Upgrade
3:27 Performance & Gaming
3:48 Battery & Charging
4:52 Camera Setup
6:16 My Opinion
7:34 What's Next?

Social Media Handles
Follow us on:
Web: \`http://trak.in\`
Instagram: \`https://www.instagram.com/trakintech\`
Twitter: \`https://www.twitter.com/trakintech\`
Twitter personal: \`https://www.twitter.com/8ap\`
Facebook: \`https://www.facebook.com/trakintech\`
For enquiries or product promotions get in touch with us on Youtube@trak.in
</Task>

<Inputs>
<Transcript>
${TRANSCRIPT_PLACEHOLDER}
</Transcript>
</Inputs>

<Instructions>
Parse the transcript to detect video flow and topics.
Use Marathi casual YouTube tone.
Build chapter highlights with timestamps.
Summarize overall video in 3–4 lines.
Add SEO-rich hashtags at the bottom.
Include social handles and links in the given format.
Output everything inside <video_description> tags.
</Instructions>`

export const TAMIL_DESCRIPTION_TEMPLATE = `<Task>
You are a YouTube video content assistant. Based on the provided transcript, generate a Tamil YouTube video description in Trakin Tech style.

Your output should include:
1. A one-line Tamil hook introducing the video.
2. A short Tamil summary encouraging viewers to watch, like, and share.
3. Disclaimer if the device was provided by a brand.
4. Product or camera sample links (if mentioned in transcript, else use placeholders).
5. SEO-optimized Tamil + English hashtags.
6. Timestamp-based chapter titles.
7. "Subscribe to our channels" section with the links.
8. Format everything exactly like a YouTube description block.

Here's the reference format to follow:

---
இந்த வீடியோவில், iPhone 17 vs Pixel 10 vs Galaxy S25 ஒப்பிட்டுப் பார்த்தோம்! நீங்கள் வாங்கக்கூடிய சிறந்த காம்பாக்ட் ஃபிளாக்ஷிப் எது என்பதை இந்த வீடியோவிலிருந்து கண்டுபிடிக்கவும்.

இந்த மதிப்பாய்வு Phone, Brand-ஆல் வழங்கப்பட்டுள்ளது. இருப்பினும், வீடியோவில் உள்ள கருத்துகள் முற்றிலும் எனது தனிப்பட்ட பயன்பாட்டை அடிப்படையாகக் கொண்டவை.

Checkout the Camera Samples: \`https://bit.ly/46WAT9Z\`

#Pixel10 #iPhone17 #GalaxyS25

=============================
00:00 Introduction
00:58 Design
03:12 Display
04:48 Performance
08:31 Camera
11:12 Software
13:00 Conclusion
===============================

Subscribe to our other channels:
Trakin Tech  - \`https://www.youtube.com/c/TrakinTech\`
Trakin Tech English - \`https://www.youtube.com/c/TrakinTechEnglish\`
Trakin Tech Marathi - \`https://www.youtube.com/c/TrakinTechMarathi\`
Trakin Auto - \`https://www.youtube.com/c/TrakinAuto\`
---
</Task>

<Inputs>
<Transcript>
${TRANSCRIPT_PLACEHOLDER}
</Transcript>
</Inputs>

<Instructions>
- Analyze the transcript to detect the main sections of the video.
- Use casual Tamil tone with some English tech words (like performance, display, etc.).
- Generate an engaging SEO-optimized description in Tamil.
- Build chapter titles with timestamps from the transcript.
- Add hashtags based on product names and brands.
- Include disclaimers, links, and subscribe section as shown in the template.
- Output everything inside <video_description> tags.
</Instructions>`
